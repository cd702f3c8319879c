export type CodeChallengeMethod = 'S256' | 'plain';

export interface AuthConfig {
  clientId: string;
  clientSecret?: string;
  redirectUri: string;
  codeChallengeMethod: CodeChallengeMethod;
}

export interface PkceChallenge {
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: CodeChallengeMethod;
  state: string;
}

export interface TokenSet {
  access_token: string;
  refresh_token: string;
  expires_at: string; // ISO 8601
  token_type: 'Bearer';
}

export type AuthStatus = 'unauthorized' | 'awaiting_callback' | 'authorized' | 'refresh_pending';
