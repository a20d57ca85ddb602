/**
 * Centralized Redaction Configuration
 * Tool parameters and escalation records routinely carry credentials
 * (wordlist auth, API keys for passive sources, session cookies).
 */
export const REDACT_KEYS = [
    // Authentication (Root and Nested)
    'authorization', '*.authorization',
    'token', '*.token',
    'access_token', '*.access_token',
    'password', '*.password',
    'passwd', '*.passwd',
    'secret', '*.secret',
    'client_secret', '*.client_secret',
    'apiKey', '*.apiKey',
    'api_key', '*.api_key',

    // Session material carried in tool parameters
    'cookie', '*.cookie',
    'cookies', '*.cookies',
    'headers.Authorization', '*.headers.Authorization',
    'headers.Cookie', '*.headers.Cookie',

    // Tool parameters nested in incidents and escalation records
    '*.parameters.password', '*.context.parameters.password',
    '*.parameters.token', '*.context.parameters.token',
    '*.parameters.api_key', '*.context.parameters.api_key',
    '*.parameters.cookie', '*.context.parameters.cookie'
];

export const REDACT_CENSOR = '[REDACTED]';
