import { createHmac, timingSafeEqual } from "node:crypto";
import { createActor, type Actor } from "@shortexec/core";
import { z } from "zod";

export type ApiTokenClaims = {
  sub: string;
  roles: string[];
  iat: number;
  exp: number;
};

export interface AuthService {
  issueApiToken(input: { sub: string; roles: readonly string[]; now: Date }): string;
  verifyApiToken(token: string): ApiTokenClaims | null;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  roles: z.array(z.string()),
  iat: z.number(),
  exp: z.number()
});

function toBase64Url(input: Buffer | string): string {
  return Buffer.from(input)
    .toString("base64")
    .replace(/=/g, "")
    .replace(/\+/g, "-")
    .replace(/\//g, "_");
}

function fromBase64Url(input: string): Buffer {
  const normalized = input.replace(/-/g, "+").replace(/_/g, "/");
  const pad = normalized.length % 4 === 0 ? "" : "=".repeat(4 - (normalized.length % 4));
  return Buffer.from(`${normalized}${pad}`, "base64");
}

/**
 * HS256-signed bearer tokens carrying the subject and its roles.
 */
export class HmacTokenAuthService implements AuthService {
  private readonly authTokenSecret: string;
  private readonly authTokenTtlSeconds: number;
  private readonly now: () => Date;

  constructor(input: { authTokenSecret: string; authTokenTtlSeconds: number; now?: () => Date }) {
    this.authTokenSecret = input.authTokenSecret;
    this.authTokenTtlSeconds = input.authTokenTtlSeconds;
    this.now = input.now ?? (() => new Date());
  }

  issueApiToken(input: { sub: string; roles: readonly string[]; now: Date }): string {
    const header = toBase64Url(JSON.stringify({ alg: "HS256", typ: "JWT" }));
    const iat = Math.floor(input.now.getTime() / 1000);
    const claims: ApiTokenClaims = {
      sub: input.sub,
      roles: [...input.roles],
      iat,
      exp: iat + this.authTokenTtlSeconds
    };
    const payload = toBase64Url(JSON.stringify(claims));
    const signingInput = `${header}.${payload}`;
    return `${signingInput}.${this.sign(signingInput)}`;
  }

  verifyApiToken(token: string): ApiTokenClaims | null {
    const [headerPart, payloadPart, signaturePart, ...rest] = token.split(".");
    if (!headerPart || !payloadPart || !signaturePart || rest.length > 0) {
      return null;
    }

    const expected = this.sign(`${headerPart}.${payloadPart}`);
    if (expected.length !== signaturePart.length) {
      return null;
    }

    if (!timingSafeEqual(Buffer.from(expected), Buffer.from(signaturePart))) {
      return null;
    }

    try {
      const parsed = claimsSchema.safeParse(JSON.parse(fromBase64Url(payloadPart).toString("utf8")));
      if (!parsed.success) {
        return null;
      }

      const nowUnix = Math.floor(this.now().getTime() / 1000);
      return parsed.data.exp > nowUnix ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private sign(signingInput: string): string {
    return toBase64Url(createHmac("sha256", this.authTokenSecret).update(signingInput).digest());
  }
}

export function actorFromClaims(claims: ApiTokenClaims): Actor {
  return createActor({ id: claims.sub, authenticated: true, roles: claims.roles });
}
