import { spawn, type ChildProcess, type SpawnOptions } from "node:child_process";
import { existsSync } from "node:fs";
import path from "node:path";
import type { Logger } from "@armguard/shared";

export interface Notifier {
  readonly enabled: boolean;
  play(): Promise<void>;
}

export interface PlayerCommand {
  command: string;
  args: string[];
}

type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

export function resolvePlayerCommand(
  soundFile: string,
  platform: NodeJS.Platform = process.platform,
  player?: string
): PlayerCommand {
  if (player) {
    return { command: player, args: [soundFile] };
  }
  if (platform === "darwin") {
    return { command: "afplay", args: [soundFile] };
  }
  if (platform === "win32") {
    const escaped = soundFile.replace(/'/g, "''");
    return {
      command: "powershell",
      args: ["-NoProfile", "-Command", `(New-Object Media.SoundPlayer '${escaped}').PlaySync()`]
    };
  }
  return { command: "aplay", args: ["-q", soundFile] };
}

export class SoundNotifier implements Notifier {
  readonly enabled = true;
  private readonly player: PlayerCommand;
  private readonly spawnFn: SpawnFn;

  constructor(args: { soundFile: string; player?: string; platform?: NodeJS.Platform; spawnFn?: SpawnFn }) {
    this.player = resolvePlayerCommand(args.soundFile, args.platform, args.player);
    this.spawnFn = args.spawnFn ?? spawn;
  }

  play(): Promise<void> {
    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = this.spawnFn(this.player.command, this.player.args, { stdio: "ignore" });
      } catch (error) {
        reject(error instanceof Error ? error : new Error(String(error)));
        return;
      }

      child.once("error", reject);
      child.once("exit", (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        reject(new Error(`${this.player.command} exited with ${signal ?? `code ${String(code)}`}`));
      });
    });
  }
}

export class AbsentNotifier implements Notifier {
  readonly enabled = false;

  async play(): Promise<void> {}
}

export function createNotifier(args: {
  soundFile?: string;
  player?: string;
  logger: Logger;
  spawnFn?: SpawnFn;
}): Notifier {
  if (!args.soundFile) {
    args.logger.info("sound alerts disabled", { reason: "no sound file configured" });
    return new AbsentNotifier();
  }
  const soundFile = path.resolve(args.soundFile);
  if (!existsSync(soundFile)) {
    args.logger.warn("sound file not found, sound alerts disabled", { sound_file: soundFile });
    return new AbsentNotifier();
  }
  args.logger.info("sound alerts enabled", { sound_file: soundFile });
  return new SoundNotifier({ soundFile, player: args.player, spawnFn: args.spawnFn });
}
