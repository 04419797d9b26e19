/**
 * Backend API interface
 *
 * Responsibility: typed calls for the session endpoints
 * Test strategy: mock per method, or run over HttpClient with a stubbed fetch
 */

import type { Result } from '@/types/Result';
import type { BirthDataPayload, HealthResponse, NetworkError, ValidateResponse } from '@/types/ApiTypes';
import type { AuthResponse, ExternalIdentityAssertion } from '@/types/AuthTypes';
import type { RetryError } from './IExponentialBackoffHandler';

export interface IApiServices {
  /** GET /health */
  healthCheck(): Promise<Result<HealthResponse, NetworkError>>;

  /** POST /api/v1/auth/apple */
  authenticateWithApple(assertion: ExternalIdentityAssertion): Promise<Result<AuthResponse, NetworkError>>;

  /** POST /api/v1/auth/refresh, authorized by the expiring token */
  refreshToken(token: string): Promise<Result<AuthResponse, NetworkError>>;

  /** GET /api/v1/auth/validate */
  validateToken(token: string): Promise<Result<ValidateResponse, NetworkError>>;

  /** POST /api/v1/auth/logout */
  logout(token: string): Promise<Result<true, NetworkError>>;

  /** POST /api/v1/chat/birth-data, retried while the error is retryable */
  syncBirthData(
    userId: string,
    birthData: BirthDataPayload,
    signal?: AbortSignal
  ): Promise<Result<true, RetryError>>;
}
