import * as fs from "node:fs";
import * as path from "node:path";

export type EditorPlatform = "Win64" | "Mac" | "Linux";

export function hostPlatform(): EditorPlatform {
  switch (process.platform) {
    case "win32":
      return "Win64";
    case "darwin":
      return "Mac";
    default:
      return "Linux";
  }
}

/** File name of an editor module binary for `platform`. */
export function editorModuleFile(moduleName: string, platform: EditorPlatform): string {
  switch (platform) {
    case "Win64":
      return `UnrealEditor-${moduleName}.dll`;
    case "Mac":
      return `UnrealEditor-${moduleName}.dylib`;
    case "Linux":
      return `libUnrealEditor-${moduleName}.so`;
  }
}

// --- Project discovery ---

/**
 * Resolve a .uproject file from a path that is either the file itself or a
 * directory inside the project. Directories are searched upward.
 */
export function findUProject(start: string): string | null {
  const resolved = path.resolve(start);
  if (resolved.endsWith(".uproject") && isFile(resolved)) return resolved;

  let current = resolved;
  for (;;) {
    try {
      const entry = fs.readdirSync(current).sort().find((e) => e.endsWith(".uproject"));
      if (entry) return path.join(current, entry);
    } catch { /* unreadable or not a directory, keep climbing */ }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function projectNameOf(uproject: string): string {
  return path.basename(uproject, ".uproject");
}

/** The project's EngineAssociation, e.g. "5.4", or null. */
export function readEngineAssociation(uproject: string): string | null {
  try {
    const data: unknown = JSON.parse(fs.readFileSync(uproject, "utf-8"));
    if (typeof data === "object" && data !== null && "EngineAssociation" in data) {
      const association = data.EngineAssociation;
      if (typeof association === "string" && association) return association;
    }
  } catch { /* unreadable project file has no association */ }
  return null;
}

// --- Build state ---

const SOURCE_EXTENSIONS = [".cpp", ".h", ".cs"];

export type BuildCheck = { needed: false } | { needed: true; reason: string };

/** Plugin directories under `<root>/Plugins` that carry C++ sources. */
function cppPlugins(root: string): string[] {
  const pluginsDir = path.join(root, "Plugins");
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(pluginsDir, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter((e) => e.isDirectory() && isDirectory(path.join(pluginsDir, e.name, "Source")))
    .map((e) => path.join(pluginsDir, e.name));
}

/** True when the project or one of its plugins has a Source directory. */
export function isCppProject(root: string): boolean {
  return isDirectory(path.join(root, "Source")) || cppPlugins(root).length > 0;
}

/**
 * Whether the editor modules must be compiled before launching: a binary is
 * missing, or a source file is newer than the binary built from it.
 */
export function needsBuild(root: string, projectName: string, platform: EditorPlatform = hostPlatform()): BuildCheck {
  if (!isCppProject(root)) return { needed: false };

  const sourceDir = path.join(root, "Source");
  if (isDirectory(sourceDir)) {
    const binary = path.join(root, "Binaries", platform, editorModuleFile(projectName, platform));
    const stale = compareToSources(binary, sourceDir);
    if (stale === "missing") return { needed: true, reason: `Project binary not found: ${path.basename(binary)}` };
    if (stale) return { needed: true, reason: `Source file '${stale}' is newer than project binary` };
  }

  for (const pluginDir of cppPlugins(root)) {
    const pluginName = path.basename(pluginDir);
    const binDir = path.join(pluginDir, "Binaries", platform);
    // Module names cannot contain '-', so plugins like "My-Plugin" build "MyPlugin".
    const candidates = [pluginName, pluginName.replace(/-/g, "")].map((n) => path.join(binDir, editorModuleFile(n, platform)));
    const binary = candidates.find(isFile);
    if (!binary) return { needed: true, reason: `Plugin '${pluginName}' binary not found` };

    const stale = compareToSources(binary, path.join(pluginDir, "Source"));
    if (stale && stale !== "missing") {
      return { needed: true, reason: `Plugin '${pluginName}' source file '${stale}' is newer than binary` };
    }
  }

  return { needed: false };
}

/** "missing" when the binary is absent, the newest newer source file name, or null. */
function compareToSources(binary: string, sourceDir: string): string | "missing" | null {
  let binaryTime: number;
  try {
    binaryTime = fs.statSync(binary).mtimeMs;
  } catch {
    return "missing";
  }
  const newest = newestSource(sourceDir);
  return newest && newest.mtimeMs > binaryTime ? newest.name : null;
}

function newestSource(dir: string): { name: string; mtimeMs: number } | null {
  let newest: { name: string; mtimeMs: number } | null = null;
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (e) {
    console.error(`[UERemote] Could not scan ${dir}:`, e);
    return null;
  }
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    let candidate: { name: string; mtimeMs: number } | null = null;
    if (entry.isDirectory()) {
      candidate = newestSource(full);
    } else if (SOURCE_EXTENSIONS.includes(path.extname(entry.name))) {
      candidate = { name: entry.name, mtimeMs: fs.statSync(full).mtimeMs };
    }
    if (candidate && (!newest || candidate.mtimeMs > newest.mtimeMs)) newest = candidate;
  }
  return newest;
}

function isFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}

function isDirectory(p: string): boolean {
  try {
    return fs.statSync(p).isDirectory();
  } catch {
    return false;
  }
}
