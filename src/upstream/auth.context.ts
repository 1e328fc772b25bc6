import type { Credentials } from '../core/config.service.js';

export type AuthScheme = Credentials['type'] | 'anonymous';

/**
 * Headers derived from an upstream's credentials. Built once at startup and
 * shared read-only by every call to that upstream.
 */
export class AuthContext {
    readonly scheme: AuthScheme;
    private readonly headers: Readonly<Record<string, string>>;

    private constructor(scheme: AuthScheme, headers: Record<string, string>) {
        this.scheme = scheme;
        this.headers = Object.freeze({ ...headers });
    }

    static anonymous(): AuthContext {
        return new AuthContext('anonymous', {});
    }

    static fromCredentials(creds: Credentials | undefined): AuthContext {
        if (!creds) {
            return AuthContext.anonymous();
        }
        switch (creds.type) {
            case 'apiKey':
                return creds.headerName
                    ? new AuthContext('apiKey', { [creds.headerName]: creds.apiKey })
                    : new AuthContext('apiKey', { 'Authorization': `Bearer ${creds.apiKey}` });
            case 'userPassword': {
                const encoded = Buffer.from(`${creds.username}:${creds.password}`, 'utf-8').toString('base64');
                return new AuthContext('userPassword', { 'Authorization': `Basic ${encoded}` });
            }
        }
    }

    get isAnonymous(): boolean {
        return this.scheme === 'anonymous';
    }

    authHeaders(): Record<string, string> {
        return { ...this.headers };
    }
}
