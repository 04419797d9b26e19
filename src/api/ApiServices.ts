/**
 * Backend API services over HttpClient.
 *
 * The refresh, validate and logout calls carry an explicit token and keep
 * TokenExpired off the expiry channel: their callers handle that outcome.
 */

import type { Result } from '../types/Result';
import type { BirthDataPayload, HealthResponse, NetworkError, ValidateResponse } from '../types/ApiTypes';
import type { AuthResponse, ExternalIdentityAssertion } from '../types/AuthTypes';
import { hasCompleteLocationData, type UserProfile } from '../types/ProfileTypes';
import type { IApiServices } from './IApiServices';
import type { IHttpClient } from './IHttpClient';
import type { RetryError } from './IExponentialBackoffHandler';
import { acceptAny, decodeAuthResponse, decodeHealth, decodeValidate } from './Decoders';

export const ENDPOINTS = {
  health: '/health',
  appleAuth: '/api/v1/auth/apple',
  refresh: '/api/v1/auth/refresh',
  validate: '/api/v1/auth/validate',
  logout: '/api/v1/auth/logout',
  birthData: '/api/v1/chat/birth-data',
} as const;

export class ApiServices implements IApiServices {
  constructor(private readonly http: IHttpClient) {}

  healthCheck(): Promise<Result<HealthResponse, NetworkError>> {
    return this.http.request(ENDPOINTS.health, 'GET', { decode: decodeHealth });
  }

  authenticateWithApple(assertion: ExternalIdentityAssertion): Promise<Result<AuthResponse, NetworkError>> {
    return this.http.request(ENDPOINTS.appleAuth, 'POST', {
      decode: decodeAuthResponse,
      body: {
        idToken: assertion.idToken,
        userIdentifier: assertion.userIdentifier,
        email: assertion.email,
        firstName: assertion.firstName,
        lastName: assertion.lastName,
      },
    });
  }

  refreshToken(token: string): Promise<Result<AuthResponse, NetworkError>> {
    return this.http.request(ENDPOINTS.refresh, 'POST', {
      decode: decodeAuthResponse,
      bearerToken: token,
      notifyOnExpiry: false,
    });
  }

  validateToken(token: string): Promise<Result<ValidateResponse, NetworkError>> {
    return this.http.request(ENDPOINTS.validate, 'GET', {
      decode: decodeValidate,
      bearerToken: token,
      notifyOnExpiry: false,
    });
  }

  logout(token: string): Promise<Result<true, NetworkError>> {
    return this.http.request(ENDPOINTS.logout, 'POST', {
      decode: acceptAny,
      bearerToken: token,
      notifyOnExpiry: false,
    });
  }

  syncBirthData(userId: string, birthData: BirthDataPayload, signal?: AbortSignal): Promise<Result<true, RetryError>> {
    return this.http.requestWithRetry(ENDPOINTS.birthData, 'POST', {
      decode: acceptAny,
      body: { userId, birthData },
      signal,
    });
  }
}

/**
 * Birth-data payload for the remote sync, or null when the profile lacks
 * a birth date or complete location data.
 */
export function toBirthDataPayload(profile: UserProfile): BirthDataPayload | null {
  if (
    !profile.birthDate ||
    !hasCompleteLocationData(profile) ||
    profile.timezone === undefined ||
    profile.birthLatitude === undefined ||
    profile.birthLongitude === undefined
  ) {
    return null;
  }

  return {
    date: profile.birthDate,
    time: profile.birthTime,
    timezone: profile.timezone,
    latitude: profile.birthLatitude,
    longitude: profile.birthLongitude,
    locationName: profile.birthPlace,
  };
}
