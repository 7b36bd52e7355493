import { BearerToken } from '../push.contracts';

/**
 * Supplies short-lived bearer tokens for the messaging gateway.
 * Obtaining and rotating the underlying service credentials is the
 * provider's business; the dispatch core only asks for a token.
 */
export interface CredentialProvider {
  getToken(): Promise<BearerToken>;
}
