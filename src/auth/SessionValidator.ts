/**
 * Session validator
 *
 * A 2xx with an empty or unrecognised body counts as valid; only an explicit
 * `{ "valid": false }` or an authentication failure invalidates the session.
 */

import type { SessionValidity } from '../types/AuthTypes';
import type { IApiServices } from '../api/IApiServices';
import { requiresReauthentication } from '../api/NetworkErrors';
import type { ISessionValidator } from './ISessionValidator';

export class SessionValidator implements ISessionValidator {
  constructor(private readonly api: IApiServices) {}

  async validate(token: string): Promise<SessionValidity> {
    const result = await this.api.validateToken(token);

    if (result.ok) {
      if (result.value.valid) {
        return { status: 'valid' };
      }
      return { status: 'invalid', reason: { type: 'AuthenticationFailed', message: 'Token rejected by server' } };
    }

    const reason = result.error;
    if (reason.type === 'NoData' || reason.type === 'DecodingError') {
      return { status: 'valid' };
    }
    if (requiresReauthentication(reason)) {
      return { status: 'invalid', reason };
    }
    return { status: 'indeterminate', reason };
  }
}
