/**
 * API Domain Types
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Classified outcome of a failed request. Closed set: callers switch on `type`.
 */
export type NetworkError =
  | { type: 'InvalidURL'; message: string }
  | { type: 'InvalidRequest'; message: string }
  | { type: 'NoData' }
  | { type: 'DecodingError' }
  | { type: 'ServerError'; code: number; message?: string }
  | { type: 'TransportError'; message: string }
  | { type: 'AuthenticationFailed'; message?: string }
  | { type: 'TokenExpired' }
  | { type: 'Offline' }
  | { type: 'Timeout' };

export type NetworkErrorKind = NetworkError['type'];

/**
 * Maps a parsed JSON body to the expected type, or null when the shape does not match.
 */
export type Decoder<T> = (json: unknown) => T | null;

export type MaxRetriesExceededError = {
  type: 'MaxRetriesExceeded';
  message: string;
  retriesAttempted: number;
  lastError: NetworkError;
};

export type HealthResponse = {
  status: string;
  message?: string;
};

export type ValidateResponse = {
  valid: boolean;
};

export type BirthDataPayload = {
  date: string; // YYYY-MM-DD
  time?: string; // HH:mm
  timezone: string;
  latitude: number;
  longitude: number;
  locationName?: string;
};
