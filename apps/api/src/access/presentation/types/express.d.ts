import type { AuthenticatedIdentity } from '../../application/authenticated-identity';

declare module 'express-serve-static-core' {
  interface Request {
    /** Set by KratosSessionGuard once the session has been validated. */
    authIdentity?: AuthenticatedIdentity;
  }
}
