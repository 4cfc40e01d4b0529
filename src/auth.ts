import { UnauthorizedError } from "./errors.js";

/** Resolves a bearer credential to the owner id it authenticates. */
export interface CredentialResolver {
  resolveOwner(credential: string | undefined): Promise<string>;
}

export function extractBearer(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = header.match(/^Bearer\s+(\S+)\s*$/i);
  return match?.[1];
}

/** Fixed token table, loaded from configuration. */
export class StaticTokenResolver implements CredentialResolver {
  constructor(private readonly tokens: ReadonlyMap<string, string>) {}

  async resolveOwner(credential: string | undefined): Promise<string> {
    if (!credential) {
      throw new UnauthorizedError("Provide a bearer token.");
    }
    const owner = this.tokens.get(credential);
    if (!owner) {
      throw new UnauthorizedError("Invalid credentials.");
    }
    return owner;
  }
}
