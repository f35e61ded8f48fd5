export class ApiException extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Missing credential secrets. Thrown before any request is made. */
export class CredentialNoSessdataException extends ApiException {
  constructor() {
    super("Credential has no SESSDATA.");
  }
}

export class CredentialNoBiliJctException extends ApiException {
  constructor() {
    super("Credential has no bili_jct.");
  }
}

export class CredentialNoBuvid3Exception extends ApiException {
  constructor() {
    super("Credential has no buvid3.");
  }
}

export class CredentialNoDedeUserIdException extends ApiException {
  constructor() {
    super("Credential has no DedeUserID.");
  }
}

export class ArgsException extends ApiException {}

export class DynamicExceedImagesException extends ApiException {
  readonly count: number;
  constructor(count: number, max: number) {
    super(`A dynamic takes at most ${max} images, got ${count}.`);
    this.count = count;
  }
}

/** Non-2xx status, or the request never completed (status 0). */
export class NetworkException extends ApiException {
  readonly status: number;
  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.status = status;
  }
}

/** Body was not JSON or not in the expected shape. */
export class ResponseException extends ApiException {}

export class ResponseCodeException extends ApiException {
  readonly code: number;
  readonly raw: unknown;
  constructor(code: number, message: string, raw: unknown) {
    super(`API error ${code}: ${message}`);
    this.code = code;
    this.raw = raw;
  }
}
