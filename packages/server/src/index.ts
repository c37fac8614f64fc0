/**
 * @idhash/server
 *
 * Password login for servers taking over users whose passwords were hashed
 * by the framework's identity subsystem (version 1 format). Built on
 * @idhash/core.
 *
 * @ai_context Provide a UserStore backed by your user table. Logins that
 * succeed against an older iteration count transparently re-hash.
 */

export { PasswordAuthenticator, UserExistsError } from './authenticator.js';
export { createExpressRoutes } from './express-routes.js';
export type { ExpressRoutesConfig } from './express-routes.js';
export { MemoryUserStore, FileUserStore } from './stores.js';
export type {
  PasswordAuthenticatorConfig,
  UserRecord,
  UserStore,
  RegistrationResult,
  AuthenticationResult,
} from './types.js';
