/**
 * Token refresh interface
 *
 * Responsibility: exchange the expiring bearer token for a new one
 * Test strategy: mock IApiServices
 */

import type { Result } from '@/types/Result';
import type { AuthResponse, RefreshError } from '@/types/AuthTypes';

export interface ITokenRefresher {
  /**
   * @returns InvalidRefreshToken when the server rejects the token itself,
   *          RefreshFailed for any other failure
   */
  refresh(expiringToken: string): Promise<Result<AuthResponse, RefreshError>>;
}
