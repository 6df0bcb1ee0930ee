import fs from "node:fs";
import type { OnExistingMode } from "../config";
import { toIOError } from "../core/errors";
import { Mutex } from "../core/mutex";
import type { ConflictChoice } from "../selection";

export interface SessionFlags {
  skipAll: boolean;
  overwriteAll: boolean;
}

export type ConflictAction = "skip" | "overwrite";
export type ConflictScope = "single" | "all_remaining";

export interface ConflictDecision {
  action: ConflictAction;
  scope: ConflictScope;
}

export interface ExistingFile {
  targetPath: string;
  sizeBytes: number;
}

export type ConflictPrompt = (existing: ExistingFile) => Promise<ConflictChoice>;

/**
 * Maps an answer to a decision and the flags that hold afterwards. The
 * "all remaining" answers latch the matching flag for the rest of the run.
 */
export function applyConflictChoice(
  choice: ConflictChoice,
  flags: Readonly<SessionFlags>,
): { decision: ConflictDecision; flags: SessionFlags } {
  switch (choice) {
    case "s":
      return { decision: { action: "skip", scope: "single" }, flags: { ...flags } };
    case "o":
      return { decision: { action: "overwrite", scope: "single" }, flags: { ...flags } };
    case "sa":
      return { decision: { action: "skip", scope: "all_remaining" }, flags: { skipAll: true, overwriteAll: false } };
    case "oa":
      return {
        decision: { action: "overwrite", scope: "all_remaining" },
        flags: { skipAll: false, overwriteAll: true },
      };
  }
}

/** Run-scoped override state. One instance per run, shared by its workers. */
export class ConflictSession {
  private current: SessionFlags;
  readonly lock = new Mutex();

  constructor(initial: Partial<SessionFlags> = {}) {
    this.current = { skipAll: initial.skipAll ?? false, overwriteAll: initial.overwriteAll ?? false };
  }

  static fromMode(mode: OnExistingMode): ConflictSession {
    return new ConflictSession({ skipAll: mode === "skip", overwriteAll: mode === "overwrite" });
  }

  get flags(): Readonly<SessionFlags> {
    return { ...this.current };
  }

  replaceFlags(flags: SessionFlags): void {
    this.current = { ...flags };
  }
}

async function statExisting(targetPath: string): Promise<ExistingFile | undefined> {
  try {
    const stat = await fs.promises.stat(targetPath);
    return { targetPath, sizeBytes: stat.size };
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw toIOError(error, targetPath);
  }
}

export class ConflictPolicy {
  private readonly prompt: ConflictPrompt;

  constructor(prompt: ConflictPrompt) {
    this.prompt = prompt;
  }

  decide(targetPath: string, session: ConflictSession): Promise<ConflictDecision> {
    return session.lock.runExclusive<ConflictDecision>(async () => {
      const flags = session.flags;
      if (flags.skipAll) {
        return { action: "skip", scope: "all_remaining" };
      }
      if (flags.overwriteAll) {
        return { action: "overwrite", scope: "all_remaining" };
      }

      const existing = await statExisting(targetPath);
      if (!existing) {
        return { action: "overwrite", scope: "single" };
      }

      const answer = await this.prompt(existing);
      const applied = applyConflictChoice(answer, flags);
      session.replaceFlags(applied.flags);
      return applied.decision;
    });
  }
}
