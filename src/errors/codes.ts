/**
 * Structured error codes carried by every {@link LatchkeyError}.
 */
export enum ErrorCode {
  UNSUPPORTED_CALL_TYPE = 'UNSUPPORTED_CALL_TYPE',
  UNSUPPORTED_EXEC_TYPE = 'UNSUPPORTED_EXEC_TYPE',
  UNSUPPORTED_MODULE_TYPE = 'UNSUPPORTED_MODULE_TYPE',
  MISMATCH_MODULE_TYPE_ID = 'MISMATCH_MODULE_TYPE_ID',
  INVALID_MODULE = 'INVALID_MODULE',
  EXECUTION_FAILED = 'EXECUTION_FAILED',
  INVALID_EXECUTION_PAYLOAD = 'INVALID_EXECUTION_PAYLOAD',
  INVALID_SIGNATURE = 'INVALID_SIGNATURE',
  ACCESS_UNAUTHORIZED = 'ACCESS_UNAUTHORIZED',
  MODULE_NOT_ATTESTED = 'MODULE_NOT_ATTESTED',
  MODULE_ALREADY_INSTALLED = 'MODULE_ALREADY_INSTALLED',
  MODULE_NOT_INSTALLED = 'MODULE_NOT_INSTALLED',
  HOOK_ALREADY_INSTALLED = 'HOOK_ALREADY_INSTALLED',
  CANNOT_REMOVE_LAST_VALIDATOR = 'CANNOT_REMOVE_LAST_VALIDATOR',
  FALLBACK_ALREADY_INSTALLED = 'FALLBACK_ALREADY_INSTALLED',
  FORBIDDEN_FALLBACK_SELECTOR = 'FORBIDDEN_FALLBACK_SELECTOR',
  UNSUPPORTED_FALLBACK_CALL_TYPE = 'UNSUPPORTED_FALLBACK_CALL_TYPE',
  MISSING_FALLBACK_HANDLER = 'MISSING_FALLBACK_HANDLER',
  ACCOUNT_ALREADY_INITIALIZED = 'ACCOUNT_ALREADY_INITIALIZED',
  INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
  INVALID_INIT_DATA = 'INVALID_INIT_DATA',
  INVALID_CONFIG = 'INVALID_CONFIG',
}
