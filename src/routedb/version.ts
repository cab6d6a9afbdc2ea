/**
 * Schema Version
 *
 * Two-component (MAJOR.MINOR) semantic version used to describe the shape
 * of a route database. There is no PATCH component: data files either change
 * their structure (major), add optional content (minor), or stay the same.
 *
 * @module routedb/version
 */

import { VersionValidationError } from './errors.js';

/**
 * Immutable MAJOR.MINOR version number.
 *
 * Versions are totally ordered, older versions being "smaller" than newer ones.
 *
 * @example
 * ```typescript
 * const supported = new Version(1, 2);
 * supported.accepts(new Version(1, 1)); // true
 * supported.accepts(new Version(1, 3)); // false
 * ```
 */
export class Version {
  /**
   * Upper limit (exclusive) for the minor component.
   * Keeps {@link Version.key} collision-free.
   */
  static readonly MINOR_LIMIT = 1000;

  readonly major: number;
  readonly minor: number;

  constructor(major: number, minor: number) {
    if (!Number.isInteger(major) || major < 0) {
      throw new VersionValidationError(
        `Major version parts must be non-negative integers, got ${major}`
      );
    }
    if (!Number.isInteger(minor) || minor < 0) {
      throw new VersionValidationError(
        `Minor version parts must be non-negative integers, got ${minor}`
      );
    }
    if (minor >= Version.MINOR_LIMIT) {
      throw new VersionValidationError(
        `Minor version parts must be smaller than ${Version.MINOR_LIMIT}, got ${minor}`
      );
    }
    this.major = major;
    this.minor = minor;
  }

  /**
   * Parse a version from its `MAJOR.MINOR` text form.
   *
   * @throws {VersionValidationError} If the text is not of that form
   */
  static parse(text: string): Version {
    const match = /^(\d+)\.(\d+)$/.exec(text.trim());
    if (!match) {
      throw new VersionValidationError(`Invalid version string: "${text}"`);
    }
    return new Version(Number(match[1]), Number(match[2]));
  }

  /**
   * Compatibility check, *not* commutative.
   *
   * This version accepts `other` if both share the same major part and the
   * minor part of `other` is not newer than this one's.
   */
  accepts(other: Version): boolean {
    return this.major === other.major && this.minor >= other.minor;
  }

  /**
   * Three-way comparison, usable as an `Array.prototype.sort` comparator.
   *
   * @returns A negative number if this version is older than `other`, zero if
   *   both are equal, a positive number otherwise
   */
  compare(other: Version): number {
    return this.key - other.key;
  }

  equals(other: Version): boolean {
    return this.major === other.major && this.minor === other.minor;
  }

  isLessThan(other: Version): boolean {
    return this.compare(other) < 0;
  }

  isLessOrEqual(other: Version): boolean {
    return this.compare(other) <= 0;
  }

  isGreaterThan(other: Version): boolean {
    return this.compare(other) > 0;
  }

  isGreaterOrEqual(other: Version): boolean {
    return this.compare(other) >= 0;
  }

  /** Numeric key, unique per version and ordered like the versions themselves. */
  get key(): number {
    return this.major * Version.MINOR_LIMIT + this.minor;
  }

  toString(): string {
    return `${this.major}.${this.minor}`;
  }

  toJSON(): string {
    return this.toString();
  }
}
