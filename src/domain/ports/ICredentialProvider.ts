/**
 * Supplies bearer tokens for the generation API.
 * Tokens can expire during long jobs, so callers ask again before every request.
 */
export interface ICredentialProvider {
    getAccessToken(): Promise<string>;
}
