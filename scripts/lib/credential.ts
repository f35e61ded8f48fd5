import {
  CredentialNoBiliJctException,
  CredentialNoBuvid3Exception,
  CredentialNoDedeUserIdException,
  CredentialNoSessdataException,
} from "./errors.js";

export interface CredentialInit {
  sessdata?: string;
  biliJct?: string;
  buvid3?: string;
  dedeuserid?: string;
}

/** Session cookies of a logged-in account. Every field is optional. */
export class Credential {
  readonly sessdata?: string;
  readonly biliJct?: string;
  readonly buvid3?: string;
  readonly dedeuserid?: string;

  constructor(init: CredentialInit = {}) {
    this.sessdata = init.sessdata || undefined;
    this.biliJct = init.biliJct || undefined;
    this.buvid3 = init.buvid3 || undefined;
    this.dedeuserid = init.dedeuserid || undefined;
  }

  /** Parses a browser `Cookie` header ("SESSDATA=...; bili_jct=..."). */
  static fromCookieString(cookie: string): Credential {
    const jar = new Map<string, string>();
    for (const part of cookie.split(";")) {
      const eq = part.indexOf("=");
      if (eq <= 0) continue;
      jar.set(part.slice(0, eq).trim(), part.slice(eq + 1).trim());
    }
    return new Credential({
      sessdata: jar.get("SESSDATA"),
      biliJct: jar.get("bili_jct"),
      buvid3: jar.get("buvid3"),
      dedeuserid: jar.get("DedeUserID"),
    });
  }

  getCookies(): Record<string, string> {
    const cookies: Record<string, string> = {};
    if (this.sessdata) cookies.SESSDATA = this.sessdata;
    if (this.biliJct) cookies.bili_jct = this.biliJct;
    if (this.buvid3) cookies.buvid3 = this.buvid3;
    if (this.dedeuserid) cookies.DedeUserID = this.dedeuserid;
    return cookies;
  }

  hasSessdata(): this is { readonly sessdata: string } {
    return this.sessdata !== undefined;
  }

  /** True when form posts can carry the `csrf` token. */
  hasBiliJct(): this is { readonly biliJct: string } {
    return this.biliJct !== undefined;
  }

  raiseForNoSessdata(): void {
    if (!this.hasSessdata()) throw new CredentialNoSessdataException();
  }

  raiseForNoBiliJct(): void {
    if (!this.hasBiliJct()) throw new CredentialNoBiliJctException();
  }

  raiseForNoBuvid3(): void {
    if (!this.buvid3) throw new CredentialNoBuvid3Exception();
  }

  raiseForNoDedeuserid(): void {
    if (!this.dedeuserid) throw new CredentialNoDedeUserIdException();
  }
}
