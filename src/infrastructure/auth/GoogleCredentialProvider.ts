import { GoogleAuth } from 'google-auth-library';
import { ICredentialProvider } from '../../domain/ports/ICredentialProvider';

export const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

/**
 * Application default credentials. The auth client refreshes the token
 * whenever it is expired or about to expire.
 */
export class GoogleCredentialProvider implements ICredentialProvider {
    private readonly auth: GoogleAuth;

    constructor(auth?: GoogleAuth) {
        this.auth = auth ?? new GoogleAuth({ scopes: [CLOUD_PLATFORM_SCOPE] });
    }

    async getAccessToken(): Promise<string> {
        const token = await this.auth.getAccessToken();
        if (!token) {
            throw new Error('Google credentials returned no access token');
        }
        return token;
    }
}
