import { SignJWT, jwtVerify } from 'jose';
import { type TokenService } from '@cad/domain';

interface JwtKey {
  kid: string;
  secret: Uint8Array;
}

interface TokenServiceConfig {
  activeKid: string;
  keys: Array<{ kid: string; secret: string }>;
  accessTokenTtl: string;
  issuer?: string;
}

export class JoseTokenService implements TokenService {
  private readonly keys: Map<string, JwtKey>;
  private readonly activeKey: JwtKey;
  private readonly accessTokenTtl: string;
  private readonly issuer: string;

  constructor(config: TokenServiceConfig) {
    this.keys = new Map();
    for (const key of config.keys) {
      this.keys.set(key.kid, {
        kid: key.kid,
        secret: new TextEncoder().encode(key.secret),
      });
    }

    const active = this.keys.get(config.activeKid);
    if (!active) {
      throw new Error(`Active JWT key '${config.activeKid}' not found in keys`);
    }
    this.activeKey = active;
    this.accessTokenTtl = config.accessTokenTtl;
    this.issuer = config.issuer ?? 'dispatch-cad';
  }

  async signAccessToken(userId: string): Promise<string> {
    return new SignJWT({ sub: userId })
      .setProtectedHeader({ alg: 'HS256', kid: this.activeKey.kid })
      .setIssuedAt()
      .setIssuer(this.issuer)
      .setExpirationTime(`${this.accessTokenTtl}s`)
      .sign(this.activeKey.secret);
  }

  async verifyAccessToken(token: string): Promise<{ userId: string }> {
    const { payload } = await jwtVerify(
      token,
      async (header) => {
        const key = header.kid ? this.keys.get(header.kid) : undefined;
        if (!key) {
          throw new Error('Unknown JWT key id');
        }
        return key.secret;
      },
      {
        issuer: this.issuer,
        algorithms: ['HS256'],
      },
    );

    if (!payload.sub) {
      throw new Error('JWT missing sub claim');
    }

    return { userId: payload.sub };
  }
}
