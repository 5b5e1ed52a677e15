// Encodings
export { encodeBase64Url, decodeBase64Url } from './core/encoding/base64url.js';
export { encodeBase32, decodeBase32, BASE32_ALPHABET } from './core/encoding/base32.js';
export type { Base32EncodeOptions } from './core/encoding/base32.js';

// Comparison
export { constantTimeEqual } from './core/crypto/constant-time.js';

// Tokens (HS256)
export * from './core/token/index.js';

// One-time passwords
export * from './core/otp/index.js';

// Ports and Node adapters
export type { HmacPort } from './ports/hmac.port.js';
export type { TimeClockPort } from './ports/time-clock.port.js';
export type { RandomBytesPort } from './ports/random-bytes.port.js';
export { NodeHmacAdapter } from './infra/node/hmac/index.js';
export { NodeTimeClock } from './infra/node/time-clock/index.js';
export { NodeRandomBytes } from './infra/node/random-bytes/index.js';

// Errors
export * from './errors/index.js';

// Config and DI
export { loadConfig, createValidatedConfig } from './config/app-config.js';
export type { AppConfig, ValidatedConfig } from './config/app-config.js';
export { initializeContainer, resetContainer, container } from './di/container.js';
export { DI } from './di/tokens.js';

export { VERSION } from './version.js';
