import { parse, serialize } from 'cookie';
import { z } from 'zod';
import { InvalidArgumentError, requireNonEmpty } from '../../domain/auth/errors.js';

/**
 * Outbound side of the HTTP exchange. An Express `Response` satisfies this.
 */
export interface CookieWriter {
  append(field: string, value: string): unknown;
}

/**
 * Inbound side of the HTTP exchange. An Express `Request` or a Node
 * `IncomingMessage` satisfies this.
 */
export interface CookieReader {
  headers: { cookie?: string | undefined };
}

/** RFC 6265 cookie-name token characters. */
const COOKIE_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]*$/;
const COOKIE_DOMAIN = /^\.?[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)*$/i;
/** Any printable ASCII except `;`. */
const COOKIE_PATH = /^[\u0020-\u003A\u003C-\u007E]+$/;

export const cookieConfigSchema = z.object({
  /** Prepended to every cookie name. */
  prefix: z.string().regex(COOKIE_NAME, 'invalid cookie name prefix').default('web_authenticate_'),
  domain: z.string().regex(COOKIE_DOMAIN, 'invalid cookie domain').optional(),
  path: z.string().regex(COOKIE_PATH, 'invalid cookie path').optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
  sameSite: z.enum(['strict', 'lax', 'none']).optional(),
});

export type CookieConfig = z.infer<typeof cookieConfigSchema>;

/**
 * Offset used to expire a cookie immediately.
 */
const DELETE_OFFSET_SECONDS = -123456789;

/** Latest instant a Date can hold; longer lifetimes are clamped to it. */
const MAX_DATE_MS = 8.64e15;

/**
 * Creates, reads and deletes cookies under one prefix with one set of
 * attributes. Holds no per-request state.
 */
export class CookieManager {
  readonly config: Readonly<CookieConfig>;

  constructor(
    config: z.input<typeof cookieConfigSchema> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.config = Object.freeze(cookieConfigSchema.parse(config));
  }

  /**
   * Ask the browser to store `prefix + name` for `expiresInSeconds`.
   * Fractions round up to the next whole second.
   */
  setCookie(res: CookieWriter, name: string, value: string, expiresInSeconds: number): void {
    this.checkName(name);
    requireNonEmpty(value, 'value');
    if (!Number.isFinite(expiresInSeconds) || expiresInSeconds <= 0) {
      throw new InvalidArgumentError('expiresInSeconds must be a positive number');
    }
    this.bakeCookie(res, name, value, Math.ceil(expiresInSeconds));
  }

  /**
   * Value of the inbound cookie `prefix + name`, or null when the browser
   * did not send it (expired cookies are never sent).
   */
  getCookie(req: CookieReader, name: string): string | null {
    this.checkName(name);
    const header = req.headers.cookie;
    if (!header) {
      return null;
    }
    const value = parse(header)[this.cookieName(name)];
    return value ? value : null;
  }

  deleteCookie(res: CookieWriter, name: string): void {
    this.checkName(name);
    this.bakeCookie(res, name, '', DELETE_OFFSET_SECONDS);
  }

  cookieName(name: string): string {
    return this.config.prefix + name;
  }

  private checkName(name: string): void {
    requireNonEmpty(name, 'name');
    if (!COOKIE_NAME.test(name)) {
      throw new InvalidArgumentError(`invalid cookie name: ${name}`);
    }
  }

  /**
   * Shared by set and delete: the sign of the offset decides whether the
   * browser keeps or drops the cookie.
   */
  private bakeCookie(res: CookieWriter, name: string, value: string, offsetSeconds: number): void {
    const nowMs = this.now().getTime();
    const offset = Math.min(offsetSeconds, Math.floor((MAX_DATE_MS - nowMs) / 1000));
    const header = serialize(this.cookieName(name), value, {
      expires: new Date(nowMs + offset * 1000),
      maxAge: offset,
      domain: this.config.domain,
      path: this.config.path,
      secure: this.config.secure,
      httpOnly: this.config.httpOnly,
      sameSite: this.config.sameSite,
    });
    res.append('Set-Cookie', header);
  }
}
