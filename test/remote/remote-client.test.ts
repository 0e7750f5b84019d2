import { describe, it, expect, afterEach } from "vitest";
import { RemoteExecutionClient, type RemoteClientOptions } from "../../src/remote/remote-client.js";
import { ExecTypes } from "../../src/remote/protocol.js";
import { FakeEditor, InMemoryBus, PID_QUERY, waitUntil, type FakeEditorOptions } from "../helpers.js";

describe("RemoteExecutionClient", () => {
  const cleanup: Array<() => Promise<void>> = [];

  afterEach(async () => {
    for (const fn of cleanup.splice(0)) await fn();
  });

  function setup(editorOptions: FakeEditorOptions = {}, clientOptions: RemoteClientOptions = {}) {
    const bus = new InMemoryBus();
    const editor = new FakeEditor(bus, editorOptions);
    const client = new RemoteExecutionClient({ ...clientOptions, transportFactory: async () => bus.transport() });
    cleanup.push(async () => {
      await client.disconnect();
      await editor.close();
    });
    return { bus, editor, client };
  }

  // --- connect ---

  it("connects and verifies the expected pid", async () => {
    const { editor, client } = setup({ pid: 4242 }, { expectedPid: 4242 });
    const connected = await client.connect(2000);
    expect(connected.ok).toBe(true);
    if (connected.ok) {
      expect(connected.value.nodeId).toBe("fake-node-1");
      expect(connected.value.processId).toBe(4242);
    }
    expect(client.isConnected()).toBe(true);
    expect(editor.commands[0]).toEqual({ command: PID_QUERY, execMode: "ExecuteStatement" });
  });

  it("rejects an editor running as a different pid", async () => {
    const { client } = setup({ pid: 9999 }, { expectedPid: 4242 });
    const connected = await client.connect(2000);
    expect(connected.ok).toBe(false);
    if (!connected.ok) {
      expect(connected.error.code).toBe("IDENTITY_MISMATCH");
      expect(connected.error.message).toBe("Editor process id mismatch: expected 4242, got 9999");
    }
    expect(client.isConnected()).toBe(false);
  });

  it("bounds pid verification by the connect timeout", async () => {
    const { editor, client } = setup({ silent: true }, { expectedPid: 4242 });
    const started = Date.now();
    const connected = await client.connect(500);
    expect(Date.now() - started).toBeLessThan(1500);
    expect(!connected.ok && connected.error.code).toBe("TIMEOUT");
    expect(editor.commands.map((c) => c.command)).toEqual([PID_QUERY]);
    expect(client.isConnected()).toBe(false);
  });

  it("still reports a mismatch when the pid answer is unusable", async () => {
    const { client } = setup(
      { respond: ({ command }) => (command === PID_QUERY ? { success: false } : null) },
      { expectedPid: 4242 },
    );
    const connected = await client.connect(2000);
    expect(!connected.ok && connected.error.code).toBe("IDENTITY_MISMATCH");
  });

  it("skips pid verification when no pid is expected", async () => {
    const { editor, client } = setup();
    const connected = await client.connect(2000);
    expect(connected.ok && connected.value.processId).toBeNull();
    expect(editor.commands).toEqual([]);
  });

  it("times out when no editor answers", async () => {
    const bus = new InMemoryBus();
    const client = new RemoteExecutionClient({ transportFactory: async () => bus.transport() });
    const connected = await client.connect(200);
    expect(!connected.ok && connected.error.code).toBe("DISCOVERY_TIMEOUT");
    expect(bus.openCount()).toBe(0);
  });

  it("shares one attempt between concurrent callers", async () => {
    const { bus, client } = setup();
    const [a, b] = await Promise.all([client.connect(2000), client.connect(2000)]);
    expect(a).toBe(b);
    expect(bus.sent.filter((m) => m.type === "open_connection")).toHaveLength(1);
  });

  // --- execute ---

  it("evaluates an expression", async () => {
    const { client } = setup();
    await client.connect(2000);
    const result = await client.execute("1+1", ExecTypes.EvaluateStatement);
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.success).toBe(true);
      expect(result.value.result).toBe("2");
    }
  });

  it("returns a failed response for code that raises", async () => {
    const { client } = setup({
      respond: ({ command }) =>
        command === "boom()" ? { success: false, result: "NameError: name 'boom' is not defined" } : null,
    });
    await client.connect(2000);
    const result = await client.execute("boom()");
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.success).toBe(false);
      expect(result.value.error).toBe("NameError: name 'boom' is not defined");
    }
  });

  it("fails with NotConnected before connect", async () => {
    const { client } = setup();
    const result = await client.execute("print(1)");
    expect(!result.ok && result.error.code).toBe("NOT_CONNECTED");
  });

  it("reports a dropped connection and is no longer connected", async () => {
    const { editor, client } = setup();
    await client.connect(2000);
    editor.dropConnection();
    await waitUntil(() => !client.isConnected());
    const result = await client.execute("print(1)");
    expect(!result.ok && result.error.code).toBe("NOT_CONNECTED");
  });

  it("times out a command the editor never answers", async () => {
    const { client } = setup({ silent: true });
    await client.connect(2000);
    const result = await client.execute("import time; time.sleep(60)", ExecTypes.ExecuteStatement, 100);
    expect(!result.ok && result.error.code).toBe("TIMEOUT");
    expect(client.isConnected()).toBe(false);
  });

  // --- verifyPid ---

  it("verifies the pid of a connected editor", async () => {
    const { client } = setup({ pid: 4242 });
    await client.connect(2000);
    expect(await client.verifyPid(4242)).toBe(true);
    expect(await client.verifyPid(1)).toBe(false);
  });

  it("treats unparseable pid output as a mismatch", async () => {
    const { client } = setup({
      respond: ({ command }) => (command === PID_QUERY ? { success: true, output: [{ type: "Info", output: "n/a\n" }] } : null),
    });
    await client.connect(2000);
    expect(await client.verifyPid(4242)).toBe(false);
  });

  it("answers false when not connected", async () => {
    const { client } = setup();
    expect(await client.verifyPid(4242)).toBe(false);
  });

  // --- disconnect ---

  it("disconnects idempotently and tells the editor", async () => {
    const { bus, editor, client } = setup();
    await client.disconnect();
    await client.connect(2000);
    await client.disconnect();
    await client.disconnect();
    expect(client.isConnected()).toBe(false);
    expect(bus.sent.filter((m) => m.type === "close_connection")).toHaveLength(1);
    await waitUntil(() => !editor.isDialedIn());
  });

  it("reconnects after a disconnect", async () => {
    const { client } = setup();
    await client.connect(2000);
    await client.disconnect();
    const again = await client.connect(2000);
    expect(again.ok).toBe(true);
    expect(client.isConnected()).toBe(true);
  });
});
