import * as fs from "node:fs";
import * as path from "node:path";
import { describe, it, expect, afterAll } from "vitest";
import { markerPath, readMarker, watchCompletion } from "../../src/tracking/completion-watcher.js";
import { cleanupTempProjects, generateTempProject } from "../bootstrap.js";

afterAll(() => cleanupTempProjects());

describe("watchCompletion", () => {
  it("places markers under Saved/Logs", () => {
    expect(markerPath("/p", "abc123")).toBe(path.join("/p", "Saved", "Logs", "abc123_completed"));
  });

  it("completes once a partially written marker is finished", async () => {
    const { root } = generateTempProject();
    const file = markerPath(root, "task1");
    fs.writeFileSync(file, '{"success": tr');
    setTimeout(() => fs.writeFileSync(file, '{"success": true, "frames": 120}'), 150);

    const outcome = await watchCompletion({ root, taskId: "task1", timeoutMs: 2000, pollIntervalMs: 50 });
    expect(outcome).toEqual({ status: "completed", marker: { taskId: "task1", success: true, payload: { frames: 120 } } });
    expect(fs.existsSync(file)).toBe(false);
  });

  it("keeps the marker when consume is false", async () => {
    const { root } = generateTempProject();
    const file = markerPath(root, "task2");
    fs.writeFileSync(file, '{"success": false, "error": "capture failed"}');

    const outcome = await watchCompletion({ root, taskId: "task2", timeoutMs: 1000, consume: false });
    expect(outcome.status === "completed" && outcome.marker.success).toBe(false);
    expect(outcome.status === "completed" && outcome.marker.payload).toEqual({ error: "capture failed" });
    expect(fs.existsSync(file)).toBe(true);
  });

  it("times out no earlier than the deadline", async () => {
    const { root } = generateTempProject();
    const started = Date.now();
    const outcome = await watchCompletion({ root, taskId: "never", timeoutMs: 300, pollIntervalMs: 50 });
    const elapsed = Date.now() - started;
    expect(outcome.status).toBe("timeout");
    expect(elapsed).toBeGreaterThanOrEqual(295);
    expect(elapsed).toBeLessThan(1500);
  });

  it("waits the full two seconds for a marker that never appears", async () => {
    const { root } = generateTempProject();
    const started = Date.now();
    const outcome = await watchCompletion({ root, taskId: "abc123", timeoutMs: 2000, pollIntervalMs: 100 });
    expect(outcome.status).toBe("timeout");
    expect(Date.now() - started).toBeGreaterThanOrEqual(1995);
  });

  it("stops when cancelled", async () => {
    const { root } = generateTempProject();
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 50);
    const started = Date.now();
    const outcome = await watchCompletion({ root, taskId: "t", timeoutMs: 5000, pollIntervalMs: 1000, signal: controller.signal });
    expect(outcome).toEqual({ status: "cancelled" });
    expect(Date.now() - started).toBeLessThan(1000);
  });
});

describe("readMarker", () => {
  it("returns null for a missing file", async () => {
    const { root } = generateTempProject();
    expect(await readMarker(markerPath(root, "missing"), "missing")).toBeNull();
  });

  it("returns null when success is not a boolean", async () => {
    const { root } = generateTempProject();
    const file = markerPath(root, "bad");
    fs.writeFileSync(file, '{"success": "yes"}');
    expect(await readMarker(file, "bad")).toBeNull();
  });
});
