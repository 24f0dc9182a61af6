// SPDX-License-Identifier: Apache-2.0

export class Regex {
  private constructor() {}

  public static escape(string_: string): string {
    return string_.replaceAll(/[-/\\^$*+?.()|[\]{}]/g, String.raw`\$&`);
  }

  /**
   * Compiles a path glob into an anchored regular expression.
   *
   * `**` matches any number of path segments, `*` anything but a `/`, `?` a single character other than `/`.
   * Patterns are matched against forward-slash separated paths.
   */
  public static fromGlob(glob: string): RegExp {
    let source = '';
    let index = 0;
    while (index < glob.length) {
      const character = glob[index];
      if (character === '*') {
        if (glob[index + 1] === '*') {
          // "**/" may also match nothing, so "a/**/b" matches "a/b"
          if (glob[index + 2] === '/') {
            source += '(?:.*/)?';
            index += 3;
          } else {
            source += '.*';
            index += 2;
          }
          continue;
        }
        source += '[^/]*';
      } else if (character === '?') {
        source += '[^/]';
      } else {
        source += Regex.escape(character);
      }
      index += 1;
    }
    return new RegExp(`^${source}$`);
  }
}
