/**
 * Principal resolved from a validated Kratos session.
 */
export type AuthenticatedIdentity = Readonly<{
  id: string;
  traits: Record<string, unknown>;
}>;
