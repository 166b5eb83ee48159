export interface CredentialRequest {
  /** App identity of the caller (the root bot) */
  fromAppId: string;
  /** App identity of the skill being called */
  toAppId: string;
  oAuthScope?: string;
}

/**
 * Supplies the `Authorization` header for outbound skill calls.
 * Token acquisition and caching belong to the implementation.
 */
export interface CredentialProvider {
  /** Returns the full header value (e.g. `Bearer <token>`), or `undefined` to send no header. */
  getAuthorizationHeader(request: CredentialRequest): Promise<string | undefined>;
}

/** Sends no credentials. Suitable for local development against unauthenticated skills. */
export const anonymousCredentials: CredentialProvider = {
  async getAuthorizationHeader() {
    return undefined;
  },
};

/** Fixed bearer tokens keyed by the skill's app id */
export function createStaticTokenCredentials(tokens: Record<string, string>): CredentialProvider {
  return {
    async getAuthorizationHeader({ toAppId }) {
      const token = tokens[toAppId];
      return token ? `Bearer ${token}` : undefined;
    },
  };
}
