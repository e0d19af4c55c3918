export const ErrorCode = {
  CONFIG_INVALID: 'CONFIG_INVALID',
  CONFIG_CREDENTIAL_MISSING: 'CONFIG_CREDENTIAL_MISSING',

  HMC_AUTH_FAILED: 'HMC_AUTH_FAILED',
  HMC_NETWORK_ERROR: 'HMC_NETWORK_ERROR',
  HMC_TIMEOUT: 'HMC_TIMEOUT',
  HMC_COMMAND_FAILED: 'HMC_COMMAND_FAILED',
  HMC_CAPABILITY_UNSUPPORTED: 'HMC_CAPABILITY_UNSUPPORTED',

  ARRAY_AUTH_FAILED: 'ARRAY_AUTH_FAILED',
  ARRAY_PERMISSION_DENIED: 'ARRAY_PERMISSION_DENIED',
  ARRAY_UNREACHABLE: 'ARRAY_UNREACHABLE',
  ARRAY_TLS_ERROR: 'ARRAY_TLS_ERROR',
  ARRAY_REQUEST_REJECTED: 'ARRAY_REQUEST_REJECTED',
  ARRAY_BAD_RESPONSE: 'ARRAY_BAD_RESPONSE',
  ARRAY_INTERNAL: 'ARRAY_INTERNAL',

  RUN_CANCELLED: 'RUN_CANCELLED',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
