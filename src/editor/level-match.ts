export const LEVEL_MATCH_POLICIES = ["exact", "name", "heuristic"] as const;

export type LevelMatchPolicy = (typeof LEVEL_MATCH_POLICIES)[number];

/** Last path segment, with any `.ObjectName` suffix dropped. */
export function levelName(levelPath: string): string {
  const segment = levelPath.split("/").pop() ?? levelPath;
  const dot = segment.indexOf(".");
  return dot >= 0 ? segment.slice(0, dot) : segment;
}

/** Package path of a level, i.e. `/Game/Maps/Foo.Foo` -> `/Game/Maps/Foo`. */
function packagePath(levelPath: string): string {
  const slash = levelPath.lastIndexOf("/");
  const dot = levelPath.indexOf(".", slash + 1);
  return dot >= 0 ? levelPath.slice(0, dot) : levelPath;
}

/**
 * Decide whether the editor's current level is the one that was requested.
 *
 * `heuristic` is deliberately loose: a request for `Untitled` matches any
 * `Untitled_N` temp level, and a bare name matches any level whose name starts
 * with it. Use `name` or `exact` when that ambiguity matters.
 */
export function levelMatches(requested: string, current: string, policy: LevelMatchPolicy): boolean {
  if (!requested || !current) return false;

  switch (policy) {
    case "exact":
      return packagePath(requested) === packagePath(current);

    case "name":
      return levelName(requested) === levelName(current);

    case "heuristic": {
      const target = levelName(requested);
      const currentName = levelName(current);
      return (
        currentName === target ||
        current === requested ||
        packagePath(current) === packagePath(requested) ||
        packagePath(current).endsWith(`/${target}`) ||
        (target.toLowerCase() === "untitled" && currentName.toLowerCase().startsWith("untitled")) ||
        currentName.startsWith(target)
      );
    }

    default: {
      const unreachable: never = policy;
      throw new Error(`Unknown level match policy: ${String(unreachable)}`);
    }
  }
}
