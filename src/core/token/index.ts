export { splitToken, signingInputOf, verifyToken } from './token-verifier.js';
export type { TokenSegments, TokenVerification, TokenVerifyError, TokenVerifierDeps } from './token-verifier.js';

export { signToken, HS256_HEADER } from './token-signer.js';
export type { TokenSignerDeps } from './token-signer.js';
