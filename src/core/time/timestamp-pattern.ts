// SPDX-License-Identifier: Apache-2.0

import {ConfigurationError} from '../errors/configuration-error.js';

type PatternToken = {kind: 'literal'; text: string} | {kind: 'field'; letter: string; width: number};

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
] as const;

const DAY_NAMES = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'] as const;

const MILLISECONDS_PER_DAY = 86_400_000;

/**
 * A compiled date-time pattern such as `yyyyMMddHHmmss`, rendered in the system default time zone.
 *
 * Supported letters: `y`/`u` year (`yy` gives the two low digits), `M` month (`MMM` short and `MMMM` full English
 * name), `d` day of month, `D` day of year, `E` day of week (`E` to `EEE` short, `EEEE` full English name), `H` hour of
 * day (0-23), `h` clock hour of am/pm (1-12), `m` minute, `s` second, `S` fraction of second and `a` for AM/PM. Text
 * between single quotes is copied as is (`''` is a single quote); any other character that is not an ASCII letter is a
 * literal.
 *
 * This is a value-based class. Instances are created with {@link TimestampPattern.compile} which rejects malformed
 * patterns up front, so that {@link TimestampPattern.format} cannot fail later on.
 */
export class TimestampPattern {
  private static readonly MAX_WIDTH: Readonly<Record<string, number>> = {
    y: 9,
    u: 9,
    M: 4,
    d: 2,
    D: 3,
    E: 4,
    H: 2,
    h: 2,
    m: 2,
    s: 2,
    S: 9,
    a: 1,
  };

  private constructor(
    public readonly pattern: string,
    private readonly tokens: readonly PatternToken[],
  ) {}

  /**
   * @throws ConfigurationError if the pattern is empty, uses an unknown letter, repeats a letter too often or has an
   * unterminated quote
   */
  public static compile(pattern: string): TimestampPattern {
    if (!pattern) {
      throw new ConfigurationError('timestamp format must not be empty', 'timestampFormat');
    }

    const tokens: PatternToken[] = [];
    let index = 0;
    while (index < pattern.length) {
      const character = pattern[index];

      if (character === "'") {
        const end = pattern.indexOf("'", index + 1);
        if (end === -1) {
          throw new ConfigurationError(`Unterminated quote in timestamp format: ${pattern}`, 'timestampFormat');
        }
        // '' is an escaped quote
        tokens.push({kind: 'literal', text: end === index + 1 ? "'" : pattern.slice(index + 1, end)});
        index = end + 1;
        continue;
      }

      if (/[A-Za-z]/.test(character)) {
        const maxWidth = TimestampPattern.MAX_WIDTH[character];
        if (maxWidth === undefined) {
          throw new ConfigurationError(
            `Unknown pattern letter '${character}' in timestamp format: ${pattern}`,
            'timestampFormat',
          );
        }
        let width = 1;
        while (pattern[index + width] === character) {
          width += 1;
        }
        if (width > maxWidth) {
          throw new ConfigurationError(
            `Too many pattern letters '${character}' in timestamp format: ${pattern}`,
            'timestampFormat',
          );
        }
        tokens.push({kind: 'field', letter: character, width});
        index += width;
        continue;
      }

      tokens.push({kind: 'literal', text: character});
      index += 1;
    }

    return new TimestampPattern(pattern, tokens);
  }

  public format(date: Date): string {
    return this.tokens.map(token => (token.kind === 'literal' ? token.text : this.field(token, date))).join('');
  }

  private field(token: {letter: string; width: number}, date: Date): string {
    const {letter, width} = token;
    switch (letter) {
      case 'y':
      case 'u': {
        const year = date.getFullYear();
        return width === 2 ? pad(year % 100, 2) : pad(year, width);
      }
      case 'M': {
        if (width >= 3) {
          const name = MONTH_NAMES[date.getMonth()];
          return width === 3 ? name.slice(0, 3) : name;
        }
        return pad(date.getMonth() + 1, width);
      }
      case 'd': {
        return pad(date.getDate(), width);
      }
      case 'D': {
        return pad(dayOfYear(date), width);
      }
      case 'E': {
        const name = DAY_NAMES[date.getDay()];
        return width === 4 ? name : name.slice(0, 3);
      }
      case 'H': {
        return pad(date.getHours(), width);
      }
      case 'h': {
        return pad(date.getHours() % 12 || 12, width);
      }
      case 'm': {
        return pad(date.getMinutes(), width);
      }
      case 's': {
        return pad(date.getSeconds(), width);
      }
      case 'S': {
        // milliseconds are the finest resolution a Date has, deeper digits are zero
        return pad(date.getMilliseconds(), 3).padEnd(width, '0').slice(0, width);
      }
      case 'a': {
        return date.getHours() < 12 ? 'AM' : 'PM';
      }
      default: {
        throw new ConfigurationError(`Unknown pattern letter '${letter}' in timestamp format: ${this.pattern}`);
      }
    }
  }
}

function dayOfYear(date: Date): number {
  const startOfDay = new Date(date.getFullYear(), date.getMonth(), date.getDate());
  const startOfYear = new Date(date.getFullYear(), 0, 1);
  // rounded, a daylight saving switch makes a local day 23 or 25 hours long
  return Math.round((startOfDay.getTime() - startOfYear.getTime()) / MILLISECONDS_PER_DAY) + 1;
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, '0');
}
