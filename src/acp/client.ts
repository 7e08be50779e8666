import { spawn, type ChildProcess } from "node:child_process";
import {
  ClientSideConnection,
  ndJsonStream,
  type Client,
  type SessionNotification,
  type RequestPermissionRequest,
  type RequestPermissionResponse,
} from "@agentclientprotocol/sdk";
import { logger as defaultLogger, type Logger } from "../logger.js";
import {
  createPermissionHandler,
  type PermissionConfig,
  DEFAULT_PERMISSION_CONFIG,
} from "./permissions.js";

const PROTOCOL_VERSION = 1;
const DEFAULT_TIMEOUT_MS = 120_000;

export interface AcpClientOptions {
  /** Path to the copilot CLI binary. Defaults to "copilot". */
  command?: string;
  /** Additional CLI args passed before --acp --stdio. */
  args?: string[];
  /** Permission handling configuration. */
  permissions?: PermissionConfig;
  /** Default prompt timeout in ms. */
  timeoutMs?: number;
  logger?: Logger;
}

export interface PromptResult {
  /** Concatenated text from agent_message_chunk updates. */
  response: string;
  /** The stop reason from the prompt response. */
  stopReason: string;
}

/**
 * Minimal Agent Client Protocol client: spawns the Copilot CLI as an ACP
 * agent over stdio and exchanges text prompts with it.
 */
export class AcpClient {
  private process: ChildProcess | null = null;
  private connection: ClientSideConnection | null = null;
  private readonly log: Logger;
  private readonly command: string;
  private readonly extraArgs: string[];
  private readonly permissionHandler: (
    params: RequestPermissionRequest,
  ) => Promise<RequestPermissionResponse>;
  private readonly defaultTimeoutMs: number;

  // Accumulate streamed chunks per session
  private sessionChunks = new Map<string, string[]>();

  // In-flight prompts, rejected if the agent process exits
  private inFlight = new Set<(err: Error) => void>();

  constructor(options: AcpClientOptions = {}) {
    this.log = options.logger ?? defaultLogger.child({ component: "acp-client" });
    this.command = options.command ?? "copilot";
    this.extraArgs = options.args ?? [];
    this.defaultTimeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.permissionHandler = createPermissionHandler(
      options.permissions ?? DEFAULT_PERMISSION_CONFIG,
      this.log,
    );
  }

  /** Spawn the agent process and run the ACP initialize handshake. */
  async connect(): Promise<void> {
    if (this.connection) {
      throw new Error("AcpClient is already connected");
    }

    const args = [...this.extraArgs, "--acp", "--stdio"];
    this.log.info({ command: this.command, args }, "spawning ACP agent");

    const proc = spawn(this.command, args, {
      stdio: ["pipe", "pipe", "pipe"],
      env: { ...process.env },
    });
    this.process = proc;

    proc.stderr?.on("data", (chunk: Buffer) => {
      this.log.debug({ stderr: chunk.toString().trimEnd() }, "agent stderr");
    });

    proc.on("error", (err: NodeJS.ErrnoException) => {
      const msg = err.code === "ENOENT"
        ? `ACP agent not found at '${this.command}'. Set copilot.executable in the config.`
        : `ACP process error: ${err.message}`;
      this.log.error({ err }, msg);
      this.rejectAllInFlight(new Error(msg));
    });

    proc.on("exit", (code, signal) => {
      this.log.info({ code, signal }, "ACP agent exited");
      this.connection = null;
      this.process = null;
      this.rejectAllInFlight(
        new Error(`ACP process exited unexpectedly (code=${code}, signal=${signal})`),
      );
    });

    const { stdin, stdout } = proc;
    if (!stdin || !stdout) {
      throw new Error("Failed to access ACP agent stdio streams");
    }

    // Node streams → web streams for the SDK
    const writable = new WritableStream<Uint8Array>({
      write(chunk) {
        return new Promise<void>((resolve, reject) => {
          const ok = stdin.write(chunk, (err) => {
            if (err) reject(err);
          });
          if (ok) resolve();
          else stdin.once("drain", resolve);
        });
      },
      close() {
        stdin.end();
      },
    });

    const readable = new ReadableStream<Uint8Array>({
      start(controller) {
        stdout.on("data", (chunk: Buffer) => controller.enqueue(new Uint8Array(chunk)));
        stdout.on("end", () => controller.close());
        stdout.on("error", (err) => controller.error(err));
      },
    });

    const sessionChunks = this.sessionChunks;
    const permissionHandler = this.permissionHandler;

    this.connection = new ClientSideConnection(
      (_agent) => {
        const client: Client = {
          async requestPermission(params) {
            return permissionHandler(params);
          },
          async sessionUpdate(params: SessionNotification): Promise<void> {
            const update = params.update;
            if (update.sessionUpdate === "agent_message_chunk" && update.content.type === "text") {
              const chunks = sessionChunks.get(params.sessionId) ?? [];
              chunks.push(update.content.text);
              sessionChunks.set(params.sessionId, chunks);
            }
          },
        };
        return client;
      },
      ndJsonStream(writable, readable),
    );

    await this.connection.initialize({
      protocolVersion: PROTOCOL_VERSION,
      clientCapabilities: {
        fs: { readTextFile: false, writeTextFile: false },
        terminal: false,
      },
    });

    this.log.info("ACP connection established");
  }

  /** Open a new agent session rooted at `cwd`; returns its id. */
  async createSession(cwd: string): Promise<string> {
    const conn = this.requireConnection();
    const response = await conn.newSession({ cwd, mcpServers: [] });
    this.sessionChunks.set(response.sessionId, []);
    this.log.info({ sessionId: response.sessionId }, "ACP session created");
    return response.sessionId;
  }

  /** Send a prompt and collect the full streamed response. */
  async sendPrompt(sessionId: string, prompt: string, timeoutMs?: number): Promise<PromptResult> {
    const conn = this.requireConnection();
    const timeout = timeoutMs ?? this.defaultTimeoutMs;

    this.sessionChunks.set(sessionId, []);
    this.log.debug({ sessionId, promptLength: prompt.length }, "sending prompt");

    const tracker: { reject: (err: Error) => void; timer?: NodeJS.Timeout } = {
      reject: () => {},
    };
    const guard = new Promise<never>((_resolve, reject) => {
      tracker.reject = reject;
      tracker.timer = setTimeout(
        () => reject(new Error(`Prompt timed out after ${timeout}ms`)),
        timeout,
      );
      tracker.timer.unref();
    });
    this.inFlight.add(tracker.reject);

    try {
      const result = await Promise.race([
        conn.prompt({ sessionId, prompt: [{ type: "text", text: prompt }] }),
        guard,
      ]);
      const response = (this.sessionChunks.get(sessionId) ?? []).join("");
      this.log.debug(
        { sessionId, stopReason: result.stopReason, responseLength: response.length },
        "prompt completed",
      );
      return { response, stopReason: result.stopReason };
    } finally {
      clearTimeout(tracker.timer);
      this.inFlight.delete(tracker.reject);
    }
  }

  /** Forget a session's buffered output. ACP has no explicit session/end. */
  endSession(sessionId: string): void {
    this.sessionChunks.delete(sessionId);
  }

  /** Terminate the agent process. */
  async disconnect(): Promise<void> {
    this.sessionChunks.clear();
    this.inFlight.clear();
    this.connection = null;

    const proc = this.process;
    if (!proc) return;
    this.process = null;

    const exited = new Promise<void>((resolve) => {
      proc.once("exit", () => resolve());
      setTimeout(() => resolve(), 3000).unref();
    });
    proc.kill("SIGTERM");
    await exited;
    if (proc.exitCode === null && proc.signalCode === null) {
      proc.kill("SIGKILL");
    }
    this.log.info("ACP client disconnected");
  }

  get connected(): boolean {
    return this.connection !== null && this.process !== null;
  }

  private requireConnection(): ClientSideConnection {
    if (!this.connection) {
      throw new Error("AcpClient is not connected — call connect() first");
    }
    return this.connection;
  }

  private rejectAllInFlight(err: Error): void {
    for (const reject of this.inFlight) {
      reject(err);
    }
    this.inFlight.clear();
  }
}
