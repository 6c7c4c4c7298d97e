export type { User, Credentials, TokenService, PasswordHasher } from './types.js';
export { AuthError, UnauthorizedError } from './types.js';

export { AuthService } from './auth-service.js';
export type { AuthServiceDeps } from './auth-service.js';
export { JwtTokenService } from './token-service.js';
export type { JwtTokenServiceOptions } from './token-service.js';
export { ScryptPasswordHasher } from './password-hasher.js';
export { UserStore } from './user-store.js';
