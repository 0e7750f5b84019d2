import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { hostPlatform, readEngineAssociation, type EditorPlatform } from "./project.js";

/** Where the launcher installs engines, by platform. */
export function defaultSearchRoots(platform: EditorPlatform = hostPlatform()): string[] {
  switch (platform) {
    case "Win64": {
      const programFiles = process.env.ProgramFiles || "C:\\Program Files";
      return [
        path.join(programFiles, "Epic Games"),
        "D:\\Epic Games",
        "E:\\Epic Games",
        "C:\\Epic Games",
      ];
    }
    case "Mac":
      return ["/Users/Shared/Epic Games", path.join(os.homedir(), "Epic Games")];
    case "Linux":
      return [path.join(os.homedir(), "Epic Games"), "/opt/Epic Games"];
  }
}

/** Editor executable inside an engine install directory. */
export function editorExecutable(installDir: string, platform: EditorPlatform = hostPlatform()): string {
  switch (platform) {
    case "Win64":
      return path.join(installDir, "Engine", "Binaries", "Win64", "UnrealEditor.exe");
    case "Mac":
      return path.join(installDir, "Engine", "Binaries", "Mac", "UnrealEditor.app", "Contents", "MacOS", "UnrealEditor");
    case "Linux":
      return path.join(installDir, "Engine", "Binaries", "Linux", "UnrealEditor");
  }
}

export interface LocateOptions {
  /** Explicit executable, e.g. from UE_EDITOR_CMD. */
  override?: string;
  uproject?: string;
  platform?: EditorPlatform;
  searchRoots?: string[];
}

/**
 * Find the editor executable for a project.
 *
 * Priority: explicit override, then the engine named by the project's
 * EngineAssociation, then the newest installed UE_5 engine.
 */
export function findEditorCmd(options: LocateOptions = {}): string | null {
  const platform = options.platform ?? hostPlatform();

  // Priority 1: explicit override
  if (options.override && fs.existsSync(options.override)) {
    return options.override;
  }

  const installs = findInstallations(options.searchRoots ?? defaultSearchRoots(platform));

  // Priority 2: the engine the project was created with
  const engineVersion = options.uproject ? readEngineAssociation(options.uproject) : null;
  if (engineVersion) {
    const match = installs.find((dir) => path.basename(dir) === `UE_${engineVersion}`);
    if (match) {
      const candidate = editorExecutable(match, platform);
      if (fs.existsSync(candidate)) {
        console.error(`[UERemote] Auto-detected engine ${engineVersion} from .uproject`);
        return candidate;
      }
    }
  }

  // Priority 3: any installed UE5, newest first
  for (const dir of installs) {
    const candidate = editorExecutable(dir, platform);
    if (fs.existsSync(candidate)) {
      console.error(
        `[UERemote] Found engine ${path.basename(dir).replace("UE_", "")} (no match for .uproject version${engineVersion ? ` ${engineVersion}` : ""})`,
      );
      return candidate;
    }
  }

  return null;
}

/** UE_5* install directories under the given roots, newest version first. */
export function findInstallations(roots: string[]): string[] {
  const installs: string[] = [];
  for (const root of roots) {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(root, { withFileTypes: true });
    } catch {
      continue; // root may not exist
    }
    for (const entry of entries) {
      if (entry.isDirectory() && entry.name.startsWith("UE_5")) installs.push(path.join(root, entry.name));
    }
  }
  // Sort descending so the newest version comes first
  return installs.sort((a, b) => path.basename(b).localeCompare(path.basename(a), undefined, { numeric: true }));
}
