import * as path from "node:path";
import { describe, it, expect, afterAll } from "vitest";
import {
  editorModuleFile,
  findUProject,
  isCppProject,
  needsBuild,
  projectNameOf,
  readEngineAssociation,
} from "../../src/editor/project.js";
import { cleanupTempProjects, generateTempProject, writeAged } from "../bootstrap.js";

afterAll(() => cleanupTempProjects());

describe("findUProject", () => {
  it("accepts the .uproject file itself", () => {
    const { uproject } = generateTempProject({ name: "Shooter" });
    expect(findUProject(uproject)).toBe(uproject);
    expect(projectNameOf(uproject)).toBe("Shooter");
  });

  it("searches upward from a directory inside the project", () => {
    const { root, uproject } = generateTempProject();
    expect(findUProject(path.join(root, "Saved", "Logs"))).toBe(uproject);
  });

  it("reads the engine association", () => {
    const { uproject } = generateTempProject({ engine: "5.3" });
    expect(readEngineAssociation(uproject)).toBe("5.3");
  });
});

describe("needsBuild", () => {
  it("never requires a build for a Blueprint-only project", () => {
    const { root, name } = generateTempProject();
    expect(isCppProject(root)).toBe(false);
    expect(needsBuild(root, name, "Linux")).toEqual({ needed: false });
  });

  it("requires a build when the project binary is missing", () => {
    const { root, name } = generateTempProject({ name: "Shooter", cpp: true });
    expect(needsBuild(root, name, "Linux")).toEqual({
      needed: true,
      reason: "Project binary not found: libUnrealEditor-Shooter.so",
    });
  });

  it("requires a build when a source file is newer than the binary", () => {
    const { root, name } = generateTempProject({ name: "Shooter" });
    writeAged(path.join(root, "Binaries", "Win64", editorModuleFile(name, "Win64")), "bin", 60);
    writeAged(path.join(root, "Source", name, "Weapon.cpp"), "// new", 0);
    expect(needsBuild(root, name, "Win64")).toEqual({
      needed: true,
      reason: "Source file 'Weapon.cpp' is newer than project binary",
    });
  });

  it("accepts an up-to-date binary", () => {
    const { root, name } = generateTempProject({ name: "Shooter" });
    writeAged(path.join(root, "Source", name, "Weapon.cpp"), "// old", 120);
    writeAged(path.join(root, "Binaries", "Mac", editorModuleFile(name, "Mac")), "bin", 60);
    expect(needsBuild(root, name, "Mac")).toEqual({ needed: false });
  });

  it("checks plugin binaries, allowing a dash-free module name", () => {
    const { root, name } = generateTempProject();
    const plugin = path.join(root, "Plugins", "My-Tools");
    writeAged(path.join(plugin, "Source", "MyTools", "Tool.h"), "// h", 120);
    expect(needsBuild(root, name, "Linux")).toEqual({ needed: true, reason: "Plugin 'My-Tools' binary not found" });

    writeAged(path.join(plugin, "Binaries", "Linux", "libUnrealEditor-MyTools.so"), "bin", 60);
    expect(needsBuild(root, name, "Linux")).toEqual({ needed: false });

    writeAged(path.join(plugin, "Source", "MyTools", "Tool.cpp"), "// newer", 0);
    expect(needsBuild(root, name, "Linux")).toEqual({
      needed: true,
      reason: "Plugin 'My-Tools' source file 'Tool.cpp' is newer than binary",
    });
  });
});
