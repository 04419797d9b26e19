/**
 * Shape checks for backend responses.
 */

import type { Decoder, HealthResponse, ValidateResponse } from '../types/ApiTypes';
import type { AuthResponse, AuthenticatedUser } from '../types/AuthTypes';

type JsonObject = Record<string, unknown>;

function asObject(json: unknown): JsonObject | null {
  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    return null;
  }
  return Object.fromEntries(Object.entries(json));
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export const decodeHealth: Decoder<HealthResponse> = json => {
  const body = asObject(json);
  if (!body || typeof body.status !== 'string') {
    return null;
  }
  return { status: body.status, message: optionalString(body.message) };
};

export const decodeValidate: Decoder<ValidateResponse> = json => {
  const body = asObject(json);
  if (!body || typeof body.valid !== 'boolean') {
    return null;
  }
  return { valid: body.valid };
};

/**
 * displayName falls back to fullName, then first + last name, then email.
 */
export const decodeUser: Decoder<AuthenticatedUser> = json => {
  const body = asObject(json);
  if (!body || typeof body.id !== 'string' || body.id.length === 0) {
    return null;
  }

  const email = optionalString(body.email);
  const fullFromParts = [optionalString(body.firstName), optionalString(body.lastName)]
    .filter((part): part is string => part !== undefined)
    .join(' ');
  const displayName =
    optionalString(body.displayName) ?? optionalString(body.fullName) ?? optionalString(fullFromParts) ?? email;

  return { id: body.id, email, displayName };
};

export const decodeAuthResponse: Decoder<AuthResponse> = json => {
  const body = asObject(json);
  if (!body || typeof body.jwtToken !== 'string' || body.jwtToken.length === 0) {
    return null;
  }
  const user = decodeUser(body.user);
  if (!user) {
    return null;
  }
  return { jwtToken: body.jwtToken, user };
};

/** For endpoints whose body is ignored, including an empty one. */
export const acceptAny: Decoder<true> = () => true;
