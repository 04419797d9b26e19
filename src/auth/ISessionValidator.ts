/**
 * Session validation interface
 *
 * Responsibility: ask the server whether a cached token is still accepted
 * Test strategy: mock IApiServices
 */

import type { SessionValidity } from '@/types/AuthTypes';

export interface ISessionValidator {
  /**
   * valid: accepted. invalid: rejected, re-authentication required.
   * indeterminate: no verdict (offline, timeout, server trouble).
   */
  validate(token: string): Promise<SessionValidity>;
}
