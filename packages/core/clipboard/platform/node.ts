import { spawn } from "node:child_process";
import * as log from "../../logger";

type Command = { cmd: string; args: string[] };

type ClipboardCommands = { read: Command[]; write: Command[] };

const PS = ["-NoProfile", "-NonInteractive", "-Command"];

const COMMANDS: Partial<Record<NodeJS.Platform, ClipboardCommands>> = {
  darwin: {
    read: [{ cmd: "pbpaste", args: [] }],
    write: [{ cmd: "pbcopy", args: [] }],
  },
  win32: {
    read: [
      {
        cmd: "powershell",
        args: [...PS, "[Console]::OutputEncoding=[Text.Encoding]::UTF8; Get-Clipboard -Raw"],
      },
    ],
    write: [
      {
        cmd: "powershell",
        args: [
          ...PS,
          "[Console]::InputEncoding=[Text.Encoding]::UTF8; Set-Clipboard -Value ([Console]::In.ReadToEnd())",
        ],
      },
    ],
  },
  linux: {
    read: [
      { cmd: "wl-paste", args: ["--no-newline"] },
      { cmd: "xclip", args: ["-selection", "clipboard", "-o"] },
      { cmd: "xsel", args: ["--clipboard", "--output"] },
    ],
    write: [
      { cmd: "wl-copy", args: [] },
      { cmd: "xclip", args: ["-selection", "clipboard"] },
      { cmd: "xsel", args: ["--clipboard", "--input"] },
    ],
  },
};

const COMMAND_TIMEOUT_MS = 5000;

class CommandFailed extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly stdout: string
  ) {
    super(message);
  }
}

function isMissingBinary(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function run(command: Command, input?: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const child = spawn(command.cmd, command.args, {
      timeout: COMMAND_TIMEOUT_MS,
      windowsHide: true,
    });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
    child.on("error", reject);
    child.on("close", (code) => {
      const out = Buffer.concat(stdout).toString("utf8");
      if (code === 0) {
        resolve(out);
      } else {
        const detail = Buffer.concat(stderr).toString("utf8").trim();
        reject(new CommandFailed(`${command.cmd} exited with ${code}: ${detail}`, code, out));
      }
    });
    child.stdin.end(input ?? "");
  });
}

export interface SystemClipboard {
  readText(): Promise<string>;
  writeText(text: string): Promise<void>;
}

/**
 * Live clipboard through the platform's clipboard tools: pbpaste/pbcopy on
 * macOS, PowerShell on Windows, wl-clipboard, xclip or xsel on Linux. The
 * first tool that exists is remembered.
 */
export function createSystemClipboard(platform: NodeJS.Platform = process.platform): SystemClipboard {
  const commands = COMMANDS[platform] ?? COMMANDS.linux;
  if (!commands) throw new Error(`Unsupported platform: ${platform}`);
  const { read, write } = commands;
  let readIdx = 0;
  let writeIdx = 0;

  async function firstAvailable(
    candidates: Command[],
    start: number,
    input?: string
  ): Promise<{ out: string; index: number }> {
    let lastError: unknown;
    for (let i = start; i < candidates.length; i++) {
      try {
        return { out: await run(candidates[i], input), index: i };
      } catch (err) {
        if (!isMissingBinary(err)) throw err;
        log.debug(`${candidates[i].cmd} not found`);
        lastError = err;
      }
    }
    throw new Error(`No clipboard tool found (tried ${candidates.map((c) => c.cmd).join(", ")})`, {
      cause: lastError,
    });
  }

  return {
    async readText() {
      try {
        const { out, index } = await firstAvailable(read, readIdx);
        readIdx = index;
        // PowerShell appends a line break to whatever it prints
        return platform === "win32" ? out.replace(/\r?\n$/, "") : out;
      } catch (err) {
        // xclip and wl-paste exit non-zero on an empty clipboard
        if (err instanceof CommandFailed && err.stdout === "") {
          log.debug(err.message);
          return "";
        }
        throw err;
      }
    },
    async writeText(text: string) {
      const { index } = await firstAvailable(write, writeIdx, text);
      writeIdx = index;
    },
  };
}
