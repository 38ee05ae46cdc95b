import ignore, { type Ignore } from 'ignore';

/**
 * One compiled gitignore-style line.
 */
export interface CompiledPattern {
  /** The line as written, minus surrounding whitespace */
  source: string;
  negated: boolean;
  /**
   * Matches only from the rule base: a leading slash, or a slash before the
   * last segment. A leading `**\/` floats the pattern again.
   */
  anchored: boolean;
  /** Trailing slash: matches directories only */
  directoryOnly: boolean;
  /** Set when the glob could not be compiled and the pattern matches as a literal substring */
  literal: boolean;
  test(relativePath: string, isDirectory: boolean): boolean;
}

/**
 * The patterns of one source (a `.gitignore`, or the user excludes),
 * evaluated together.
 */
export interface PatternList {
  patterns: CompiledPattern[];
  /**
   * True when the list ignores the path, false when a negation re-includes
   * it, undefined when no pattern matched.
   */
  verdict(relativePath: string, isDirectory: boolean): boolean | undefined;
}

type Verdict = (relativePath: string, isDirectory: boolean) => boolean | undefined;

function createIgnore(): Ignore {
  // Names such as `...` look like `../` to `ignore`; match them as plain names.
  return ignore({ ignorecase: false, allowRelativePaths: true });
}

function asTarget(relativePath: string, isDirectory: boolean): string {
  return isDirectory ? `${relativePath}/` : relativePath;
}

/**
 * Whether `glob` opens a `[` class that never closes.
 */
function hasUnclosedBracket(glob: string): boolean {
  let open = false;
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i];
    if (ch === '\\') {
      i++;
    } else if (ch === '[') {
      open = true;
    } else if (ch === ']') {
      open = false;
    }
  }
  return open;
}

function literalPattern(
  source: string,
  negated: boolean,
  anchored: boolean,
  directoryOnly: boolean,
  stem: string,
): CompiledPattern {
  const needle = stem.replace(/^\/+/, '');
  return {
    source,
    negated,
    anchored,
    directoryOnly,
    literal: true,
    test: (relativePath, isDirectory) =>
      (isDirectory || !directoryOnly) &&
      (anchored ? relativePath.startsWith(needle) : relativePath.includes(needle)),
  };
}

/**
 * Compiles one pattern line. Returns undefined for blank lines, comments and
 * lines with nothing left to match (`!`, `/`).
 *
 * Never throws: a glob that cannot be compiled degrades to a literal substring match.
 */
export function compilePattern(line: string): CompiledPattern | undefined {
  const source = line.trim();
  if (!source || source.startsWith('#')) {
    return undefined;
  }

  const negated = source.startsWith('!');
  const body = negated ? source.slice(1) : source;
  const directoryOnly = body.endsWith('/');
  const stem = directoryOnly ? body.slice(0, -1) : body;
  if (!stem.replace(/\//g, '')) {
    return undefined;
  }
  const anchored = !stem.startsWith('**/') && stem.includes('/');

  if (hasUnclosedBracket(stem)) {
    return literalPattern(source, negated, anchored, directoryOnly, stem);
  }

  try {
    const ig = createIgnore().add(body);
    return {
      source,
      negated,
      anchored,
      directoryOnly,
      literal: false,
      test: (relativePath, isDirectory) =>
        relativePath !== '' && ig.ignores(asTarget(relativePath, isDirectory)),
    };
  } catch {
    return literalPattern(source, negated, anchored, directoryOnly, stem);
  }
}

/**
 * Compiles pattern lines into one list. Consecutive globs share an `ignore`
 * instance, so a path is matched the way git matches it: a directory
 * re-included by `!dir/` does not re-include the files inside it.
 */
export function compilePatternList(lines: Iterable<string>): PatternList {
  const patterns: CompiledPattern[] = [];
  const steps: Verdict[] = [];
  let group: Ignore | undefined;

  for (const line of lines) {
    const pattern = compilePattern(line);
    if (!pattern) continue;
    patterns.push(pattern);

    if (pattern.literal) {
      group = undefined;
      steps.push((relativePath, isDirectory) =>
        pattern.test(relativePath, isDirectory) ? !pattern.negated : undefined,
      );
      continue;
    }

    if (!group) {
      const ig = createIgnore();
      group = ig;
      steps.push((relativePath, isDirectory) => {
        if (relativePath === '') return undefined;
        const result = ig.test(asTarget(relativePath, isDirectory));
        if (result.ignored) return true;
        if (result.unignored) return false;
        return undefined;
      });
    }
    group.add(pattern.source);
  }

  return {
    patterns,
    verdict(relativePath, isDirectory) {
      let verdict: boolean | undefined;
      for (const step of steps) {
        const next = step(relativePath, isDirectory);
        if (next !== undefined) verdict = next;
      }
      return verdict;
    },
  };
}

/**
 * Whether a compiled pattern's glob matches, ignoring its negation flag.
 */
export function matchesPattern(
  pattern: CompiledPattern,
  relativePath: string,
  isDirectory: boolean,
): boolean {
  return pattern.test(relativePath, isDirectory);
}

/**
 * Compiles `line` and tests it against a path relative to the rule base.
 */
export function matches(line: string, relativePath: string, isDirectory: boolean): boolean {
  const pattern = compilePattern(line);
  return pattern !== undefined && pattern.test(relativePath, isDirectory);
}

/**
 * Compiles `.gitignore` content, in file order.
 */
export function parseRules(content: string): PatternList {
  return compilePatternList(content.split(/\r?\n/));
}
