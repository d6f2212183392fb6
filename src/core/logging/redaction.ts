/**
 * Redaction configuration for pino.
 *
 * Contexts and subjects are user data and end up in debug logs; never log
 * their secrets.
 */
export const REDACTION_CONFIG = {
  paths: [
    // Top-level sensitive fields
    'token',
    'secret',
    'password',
    'apiKey',
    'authorization',

    // One level nested (*.field)
    '*.token',
    '*.secret',
    '*.password',
    '*.apiKey',

    // Evaluation payloads
    'context.subject.password',
    'context.subject.token',
    'context.extras.*.token',
    'context.extras.*.password',
    'subject.password',
    'subject.token',
    'extras.*.token',
    'extras.*.password',
  ],
  censor: '[REDACTED]',
};
