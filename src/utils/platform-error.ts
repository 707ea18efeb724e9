import { PlatformErrorKind } from '../types';

// Discord JSON error codes: Missing Access, Missing Permissions, Cannot execute action on this channel type.
const PERMISSION_ERROR_CODES = new Set([50001, 50013, 50024]);

// Unknown Channel, Guild, Member, Message, Role, User, Webhook, Ban.
const NOT_FOUND_ERROR_CODES = new Set([10003, 10004, 10007, 10008, 10011, 10013, 10015, 10026]);

function readNumericField(error: unknown, key: 'status' | 'code'): number | undefined {
  if (!error || typeof error !== 'object') {
    return undefined;
  }

  const value: unknown = Reflect.get(error, key);
  if (typeof value !== 'number') {
    return undefined;
  }

  return Number.isFinite(value) ? value : undefined;
}

export function classifyPlatformError(error: unknown): PlatformErrorKind {
  const code = readNumericField(error, 'code');
  if (code !== undefined) {
    if (PERMISSION_ERROR_CODES.has(code)) return 'permission_denied';
    if (NOT_FOUND_ERROR_CODES.has(code)) return 'not_found';
  }

  const status = readNumericField(error, 'status');
  if (status === 403) return 'permission_denied';
  if (status === 404) return 'not_found';

  const normalized = errorMessage(error).toLowerCase();
  if (normalized.includes('missing permissions') || normalized.includes('missing access')) {
    return 'permission_denied';
  }
  if (normalized.includes('unknown ') || normalized.includes('not found')) {
    return 'not_found';
  }

  return 'transient';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
