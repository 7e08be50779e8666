import { describe, it, expect, vi, beforeEach } from "vitest";
import { EventEmitter } from "node:events";
import { Readable, Writable } from "node:stream";
import type { ChildProcess } from "node:child_process";
import type { Client } from "@agentclientprotocol/sdk";

// Mock child_process before importing modules that use it
const mockSpawn = vi.fn();
vi.mock("node:child_process", () => ({
  spawn: (...args: unknown[]) => mockSpawn(...args),
}));

// Mock the SDK to avoid real connections
const mockInitialize = vi.fn();
const mockNewSession = vi.fn();
const mockPrompt = vi.fn();
const handlers: Client[] = [];
vi.mock("@agentclientprotocol/sdk", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@agentclientprotocol/sdk")>();
  return {
    ...actual,
    ClientSideConnection: vi.fn().mockImplementation((toClient: (agent: unknown) => Client) => {
      handlers.push(toClient({}));
      return {
        initialize: mockInitialize,
        newSession: mockNewSession,
        prompt: mockPrompt,
      };
    }),
    ndJsonStream: vi.fn().mockReturnValue({
      writable: new WritableStream(),
      readable: new ReadableStream(),
    }),
  };
});

import { AcpClient } from "../../src/acp/client.js";
import { createLogger } from "../../src/logger.js";

function createMockProcess(): ChildProcess {
  const proc = new EventEmitter() as ChildProcess & EventEmitter;
  const stdin = new Writable({
    write(_chunk, _encoding, callback) {
      callback();
    },
  });
  const stdout = new Readable({ read() {} });
  const stderr = new Readable({ read() {} });

  Object.assign(proc, {
    stdin,
    stdout,
    stderr,
    pid: 12345,
    killed: false,
    kill: vi.fn().mockImplementation(function (this: { killed: boolean }) {
      this.killed = true;
      proc.emit("exit", 0, null);
      return true;
    }),
  });

  return proc as unknown as ChildProcess;
}

describe("AcpClient", () => {
  const silentLogger = createLogger({ level: "error", pretty: false });

  beforeEach(() => {
    vi.clearAllMocks();
    handlers.length = 0;
    mockInitialize.mockResolvedValue({ protocolVersion: 1 });
    mockNewSession.mockResolvedValue({ sessionId: "session-123" });
    mockPrompt.mockResolvedValue({ stopReason: "end_turn" });
  });

  async function connectedClient(timeoutMs?: number): Promise<{ client: AcpClient; proc: ChildProcess }> {
    const proc = createMockProcess();
    mockSpawn.mockReturnValue(proc);
    const client = new AcpClient({ logger: silentLogger, timeoutMs });
    await client.connect();
    return { client, proc };
  }

  describe("connect / disconnect", () => {
    it("spawns the agent in ACP stdio mode and initializes", async () => {
      const { client } = await connectedClient();

      expect(mockSpawn).toHaveBeenCalledWith(
        "copilot",
        ["--acp", "--stdio"],
        expect.objectContaining({ stdio: ["pipe", "pipe", "pipe"] }),
      );
      expect(client.connected).toBe(true);
      expect(mockInitialize).toHaveBeenCalledWith({
        protocolVersion: 1,
        clientCapabilities: {
          fs: { readTextFile: false, writeTextFile: false },
          terminal: false,
        },
      });

      await client.disconnect();
    });

    it("passes extra args before --acp --stdio", async () => {
      mockSpawn.mockReturnValue(createMockProcess());
      const client = new AcpClient({ command: "/opt/copilot", args: ["--verbose"], logger: silentLogger });
      await client.connect();

      expect(mockSpawn).toHaveBeenCalledWith(
        "/opt/copilot",
        ["--verbose", "--acp", "--stdio"],
        expect.any(Object),
      );

      await client.disconnect();
    });

    it("throws if connect is called twice", async () => {
      const { client } = await connectedClient();
      await expect(client.connect()).rejects.toThrow("AcpClient is already connected");
      await client.disconnect();
    });

    it("kills the process on disconnect", async () => {
      const { client, proc } = await connectedClient();
      await client.disconnect();
      expect(proc.kill).toHaveBeenCalledWith("SIGTERM");
      expect(client.connected).toBe(false);
    });

    it("handles disconnect when not connected", async () => {
      const client = new AcpClient({ logger: silentLogger });
      await expect(client.disconnect()).resolves.toBeUndefined();
    });
  });

  describe("createSession", () => {
    it("creates a session without MCP servers", async () => {
      const { client } = await connectedClient();

      await expect(client.createSession("/tmp/project")).resolves.toBe("session-123");
      expect(mockNewSession).toHaveBeenCalledWith({ cwd: "/tmp/project", mcpServers: [] });

      await client.disconnect();
    });

    it("throws when not connected", async () => {
      const client = new AcpClient({ logger: silentLogger });
      await expect(client.createSession("/tmp")).rejects.toThrow("not connected");
    });
  });

  describe("sendPrompt", () => {
    it("collects streamed text chunks into the response", async () => {
      const { client } = await connectedClient();
      await client.createSession("/tmp");

      mockPrompt.mockImplementation(async () => {
        const handler = handlers[0];
        await handler?.sessionUpdate({
          sessionId: "session-123",
          update: { sessionUpdate: "agent_message_chunk", content: { type: "text", text: "Hello, " } },
        });
        await handler?.sessionUpdate({
          sessionId: "session-123",
          update: { sessionUpdate: "agent_message_chunk", content: { type: "text", text: "team" } },
        });
        return { stopReason: "end_turn" };
      });

      const result = await client.sendPrompt("session-123", "Hi");

      expect(mockPrompt).toHaveBeenCalledWith({
        sessionId: "session-123",
        prompt: [{ type: "text", text: "Hi" }],
      });
      expect(result).toEqual({ response: "Hello, team", stopReason: "end_turn" });

      await client.disconnect();
    });

    it("starts each prompt with an empty buffer", async () => {
      const { client } = await connectedClient();
      await client.createSession("/tmp");

      const first = await client.sendPrompt("session-123", "one");
      const second = await client.sendPrompt("session-123", "two");
      expect(first.response).toBe("");
      expect(second.response).toBe("");

      await client.disconnect();
    });

    it("throws when not connected", async () => {
      const client = new AcpClient({ logger: silentLogger });
      await expect(client.sendPrompt("session-123", "test")).rejects.toThrow("not connected");
    });

    it("rejects on timeout", async () => {
      mockPrompt.mockImplementation(() => new Promise(() => {}));
      const { client } = await connectedClient(50);
      await client.createSession("/tmp");

      await expect(client.sendPrompt("session-123", "slow prompt")).rejects.toThrow(
        "Prompt timed out after 50ms",
      );

      await client.disconnect();
    });

    it("rejects every in-flight prompt when the process exits", async () => {
      mockPrompt.mockImplementation(() => new Promise(() => {}));
      const { client, proc } = await connectedClient(60_000);
      await client.createSession("/tmp");

      const p1 = client.sendPrompt("session-123", "prompt 1");
      const p2 = client.sendPrompt("session-123", "prompt 2");

      (proc as unknown as EventEmitter).emit("exit", 1, "SIGKILL");

      await expect(p1).rejects.toThrow("ACP process exited unexpectedly (code=1, signal=SIGKILL)");
      await expect(p2).rejects.toThrow("ACP process exited unexpectedly");
      expect(client.connected).toBe(false);
    });
  });

  describe("permissions", () => {
    it("rejects tool calls by default", async () => {
      const { client } = await connectedClient();

      const response = await handlers[0]?.requestPermission({
        sessionId: "session-123",
        toolCall: { toolCallId: "tc-1", title: "shell: rm -rf build" },
        options: [
          { optionId: "yes", name: "Allow", kind: "allow_once" },
          { optionId: "no", name: "Reject", kind: "reject_once" },
        ],
      });
      expect(response).toEqual({ outcome: { outcome: "selected", optionId: "no" } });

      await client.disconnect();
    });
  });
});
