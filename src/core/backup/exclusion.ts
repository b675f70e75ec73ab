/**
 * Exclusion rules
 *
 * Two rules exist and are kept apart on purpose. The tree walk excludes a
 * path when its full path string contains any pattern, so `*.log` only
 * matches a literal asterisk there. Single files appended outside a walk go
 * through `excludesFile`, where `*.<ext>` patterns are suffix matches.
 * Unifying them would change which files land in existing archives.
 */

export class ExclusionSet {
  readonly patterns: readonly string[];

  constructor(patterns: readonly string[] = []) {
    this.patterns = [...patterns];
  }

  /**
   * Tree-walk rule: plain substring test, no globbing, no anchoring
   */
  excludes(candidatePath: string): boolean {
    return this.patterns.some((pattern) => candidatePath.includes(pattern));
  }

  /**
   * Single-file rule: `*.ext` is a suffix match, anything else a substring
   */
  excludesFile(candidatePath: string): boolean {
    return this.patterns.some((pattern) =>
      pattern.startsWith("*.")
        ? candidatePath.endsWith(pattern.slice(1))
        : candidatePath.includes(pattern),
    );
  }

  /**
   * Copy with extra patterns appended
   */
  with(...extra: string[]): ExclusionSet {
    return new ExclusionSet([...this.patterns, ...extra]);
  }
}
