/**
 * Markup that has passed through a sanitizer.
 *
 * `ElementRender.html()` and `IRendererAdapter.setInnerHTML()` take nothing
 * else; a plain string is a TypeError. The engine ships no sanitizer of its
 * own, so the application registers one before the first `sanitize()` call:
 *
 * @example
 * import DOMPurify from 'dompurify';
 *
 * SafeHTML.configureSanitizer(DOMPurify);
 * root.child('article', a => a.html(SafeHTML.sanitize(post.body)));
 */

import { warn } from './log.js';

/** Anything with DOMPurify's `sanitize(string)` shape */
export interface HTMLSanitizer {
  sanitize(html: string): string;
}

const BRAND = Symbol.for('spindle.SafeHTML');

let sanitizer: HTMLSanitizer | null = null;

export class SafeHTML {
  private constructor(private readonly markup: string) {
    // Recognized by brand too, for copies of this module loaded twice.
    Object.defineProperty(this, BRAND, { value: true });
  }

  static configureSanitizer(candidate: HTMLSanitizer): void {
    if (typeof candidate !== 'object' || candidate === null || typeof candidate.sanitize !== 'function') {
      throw new TypeError('Spindle: configureSanitizer() expects an object with a sanitize(html) method, e.g. DOMPurify.');
    }
    sanitizer = candidate;
  }

  static hasSanitizer(): boolean {
    return sanitizer !== null;
  }

  /** Drop the registered sanitizer (tests) */
  static resetSanitizer(): void {
    sanitizer = null;
  }

  /** @throws TypeError while no sanitizer is registered */
  static sanitize(html: string): SafeHTML {
    if (sanitizer === null) {
      throw new TypeError('Spindle: no HTML sanitizer registered. Call SafeHTML.configureSanitizer() first.');
    }
    return new SafeHTML(sanitizer.sanitize(html));
  }

  /** Wrap markup as-is. Meant for literals in the application's own code. */
  static unsafe(html: string): SafeHTML {
    warn('SafeHTML.unsafe() skips the sanitizer; never pass it user input.');
    return new SafeHTML(html);
  }

  static empty(): SafeHTML {
    return new SafeHTML('');
  }

  static isSafeHTML(value: unknown): value is SafeHTML {
    if (value instanceof SafeHTML) return true;
    return typeof value === 'object' && value !== null && Reflect.get(value, BRAND) === true;
  }

  toString(): string {
    return this.markup;
  }

  toJSON(): string {
    return this.markup;
  }
}
