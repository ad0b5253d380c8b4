/**
 * Matches file names against a shell-style pattern.
 *
 * Supported syntax: `*` (any run of characters), `?` (one character) and
 * `{a,b}` alternation. Matching is against the base name only and is
 * case-sensitive.
 */
export class GlobMatcher {
  private readonly regex: RegExp;

  constructor(readonly pattern: string) {
    this.regex = new RegExp(`^${GlobMatcher.toRegexSource(pattern)}$`);
  }

  matches(fileName: string): boolean {
    return this.regex.test(fileName);
  }

  private static toRegexSource(pattern: string): string {
    let source = '';
    let inGroup = false;

    for (const char of pattern) {
      switch (char) {
        case '*':
          source += '.*';
          break;
        case '?':
          source += '.';
          break;
        case '{':
          inGroup = true;
          source += '(?:';
          break;
        case '}':
          if (inGroup) {
            inGroup = false;
            source += ')';
          } else {
            source += '\\}';
          }
          break;
        case ',':
          source += inGroup ? '|' : ',';
          break;
        default:
          source += char.replace(/[.+^$()|[\]\\]/g, '\\$&');
      }
    }

    if (inGroup) {
      throw new SyntaxError(`Unclosed '{' in pattern: ${pattern}`);
    }
    return source;
  }
}
