/**
 * Token refresh implementation
 *
 * POST /api/v1/auth/refresh with the expiring token as bearer.
 */

import { ok, err, type Result } from '../types/Result';
import type { AuthResponse, RefreshError } from '../types/AuthTypes';
import type { IApiServices } from '../api/IApiServices';
import { describeNetworkError, requiresReauthentication } from '../api/NetworkErrors';
import type { ITokenRefresher } from './ITokenRefresher';

export class TokenRefresher implements ITokenRefresher {
  constructor(private readonly api: IApiServices) {}

  async refresh(expiringToken: string): Promise<Result<AuthResponse, RefreshError>> {
    const result = await this.api.refreshToken(expiringToken);
    if (result.ok) {
      return ok(result.value);
    }

    const cause = result.error;
    if (requiresReauthentication(cause)) {
      return err({ type: 'InvalidRefreshToken', message: describeNetworkError(cause) });
    }
    return err({ type: 'RefreshFailed', message: describeNetworkError(cause), cause });
  }
}
