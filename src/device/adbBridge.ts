import { execFile } from "node:child_process";
import type { BridgeCallOptions, DeviceBridge, Logger, TelephonySource } from "../types/domain.js";

const DEFAULT_TIMEOUT_MS = 5000;
const UI_DUMP_PATH = "/sdcard/window_dump.xml";
const KEYCODE_CALL = "5";
const KEYCODE_ENDCALL = "6";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export interface CommandRunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: CommandRunOptions
) => Promise<CommandResult>;

export class AdbCommandError extends Error {
  constructor(
    readonly args: readonly string[],
    readonly exitCode: number | string | null,
    readonly stderr: string,
    cause?: unknown
  ) {
    super(`adb ${args.join(" ")} failed${exitCode !== null ? ` (${exitCode})` : ""}: ${stderr.trim() || "no output"}`, {
      cause,
    });
    this.name = "AdbCommandError";
  }
}

export interface AdbBridgeOptions {
  adbPath?: string;
  serial?: string;
  /**
   * Shell command that makes the device speak; `{text}` is replaced by the
   * single-quoted reply. Without it the reply is posted as a notification.
   */
  speakCommand?: string;
  runner?: CommandRunner;
  logger?: Logger;
}

export interface AdbDevice {
  serial: string;
  state: string;
}

const TELEPHONY_COMMANDS: Record<TelephonySource, readonly string[]> = {
  registry: ["shell", "dumpsys", "telephony.registry"],
  property: ["shell", "getprop", "gsm.voice.call.state"],
  audio: ["shell", "dumpsys", "audio"],
};

export const execFileRunner: CommandRunner = (file, args, options) =>
  new Promise((resolve, reject) => {
    execFile(
      file,
      [...args],
      {
        timeout: options.timeoutMs,
        signal: options.signal,
        encoding: "utf8",
        maxBuffer: 16 * 1024 * 1024,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (error) {
          const code = typeof error.code === "number" || typeof error.code === "string" ? error.code : null;
          reject(new AdbCommandError(args, code, stderr || error.message, error));
          return;
        }
        resolve({ stdout, stderr });
      }
    );
  });

export class AdbBridge implements DeviceBridge {
  private readonly adbPath: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(private readonly options: AdbBridgeOptions = {}) {
    this.adbPath = options.adbPath ?? "adb";
    this.runner = options.runner ?? execFileRunner;
    this.logger = options.logger ?? console;
  }

  async readTelephonyState(source: TelephonySource, options: BridgeCallOptions = {}): Promise<string> {
    const { stdout } = await this.adb(TELEPHONY_COMMANDS[source], options);
    return stdout;
  }

  async answerCall(options: BridgeCallOptions = {}): Promise<void> {
    await this.adb(["shell", "input", "keyevent", KEYCODE_CALL], options);
  }

  async hangUp(options: BridgeCallOptions = {}): Promise<void> {
    await this.adb(["shell", "input", "keyevent", KEYCODE_ENDCALL], options);
  }

  async speak(text: string, options: BridgeCallOptions = {}): Promise<void> {
    const quoted = quoteForShell(text);

    if (this.options.speakCommand) {
      await this.adb(["shell", this.options.speakCommand.split("{text}").join(quoted)], options);
      return;
    }

    this.logger.warn("[adb] no speak command configured, posting reply as a notification");
    await this.adb(
      ["shell", `cmd notification post -S bigtext -t ${quoteForShell("Auto reply")} auto_reply ${quoted}`],
      options
    );
  }

  async dumpUi(options: BridgeCallOptions = {}): Promise<string> {
    await this.adb(["shell", "uiautomator", "dump", UI_DUMP_PATH], options);
    const { stdout } = await this.adb(["shell", "cat", UI_DUMP_PATH], options);
    return stdout;
  }

  async listDevices(options: BridgeCallOptions = {}): Promise<AdbDevice[]> {
    const { stdout } = await this.run(["devices"], options);
    return parseDeviceList(stdout);
  }

  private adb(args: readonly string[], options: BridgeCallOptions): Promise<CommandResult> {
    const target = this.options.serial ? ["-s", this.options.serial] : [];
    return this.run([...target, ...args], options);
  }

  private run(args: readonly string[], options: BridgeCallOptions): Promise<CommandResult> {
    return this.runner(this.adbPath, args, {
      timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      signal: options.signal,
    });
  }
}

export function parseDeviceList(output: string): AdbDevice[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("*") && !line.startsWith("List of devices"))
    .map((line) => {
      const [serial, state = "unknown"] = line.split(/\s+/);
      return { serial, state };
    });
}

export function quoteForShell(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
