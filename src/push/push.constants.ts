export const PUSH_CONFIG = 'PUSH_CONFIG';
export const MESSAGING_GATEWAY = 'MESSAGING_GATEWAY';
export const CREDENTIAL_PROVIDER = 'CREDENTIAL_PROVIDER';
export const PUSH_DELAY = 'PUSH_DELAY';
export const PUSH_HTTP_ADAPTER = 'PUSH_HTTP_ADAPTER';

// FCM rejects these data keys outright.
export const RESERVED_DATA_KEYS: readonly string[] = ['from', 'notification', 'message_type'];
export const RESERVED_DATA_KEY_PREFIXES: readonly string[] = ['google.', 'gcm.'];

// 28 days, the longest TTL the gateway accepts.
export const MAX_TTL_SECONDS = 2_419_200;
