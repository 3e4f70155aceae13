/**
 * Process-level exclusive lock on the archive.
 *
 * The lock file is created with O_EXCL and records the holder's pid. A lock
 * whose holder is no longer running is taken over, and so is one that stayed
 * unreadable for longer than the grace period (a holder that died between
 * creating and writing it).
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ArchiveBusy } from "./errors.js";
import { isoNow } from "../utils/time.js";

export interface ArchiveLock {
  path: string;
  release(): Promise<void>;
}

export interface LockOptions {
  pid?: number;
  isProcessAlive?: (pid: number) => boolean;
  /** How long an unreadable lock file counts as held. */
  unreadableGraceMs?: number;
  now?: () => number;
}

const DEFAULT_UNREADABLE_GRACE_MS = 10_000;

const LockInfoSchema = z.object({
  pid: z.number().int(),
  acquired_at: z.string(),
});

type LockInfo = z.infer<typeof LockInfoSchema>;

type LockState =
  | { state: "missing" }
  | { state: "held"; info: LockInfo }
  | { state: "unreadable"; ageMs: number };

export function processAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errorCode(err) === "EPERM";
  }
}

export async function acquireLock(
  lockPath: string,
  options: LockOptions = {}
): Promise<ArchiveLock> {
  const pid = options.pid ?? process.pid;
  const isAlive = options.isProcessAlive ?? processAlive;

  await fs.mkdir(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      const handle = await fs.open(lockPath, "wx");
      try {
        const info: LockInfo = { pid, acquired_at: isoNow() };
        await handle.writeFile(JSON.stringify(info), "utf-8");
      } finally {
        await handle.close();
      }
      return {
        path: lockPath,
        release: () => fs.rm(lockPath, { force: true }),
      };
    } catch (err) {
      if (errorCode(err) !== "EEXIST") throw err;
    }

    const holder = await readLockState(lockPath, options.now ?? Date.now);
    // Released between our open() and read: try again
    if (holder.state === "missing") continue;

    if (holder.state === "unreadable") {
      if (holder.ageMs < (options.unreadableGraceMs ?? DEFAULT_UNREADABLE_GRACE_MS)) {
        throw new ArchiveBusy(lockPath, null);
      }
      console.error(`[lock] Removing unreadable lock (${lockPath})`);
    } else {
      if (isAlive(holder.info.pid)) {
        throw new ArchiveBusy(lockPath, holder.info.pid);
      }
      console.error(`[lock] Removing stale lock held by pid ${holder.info.pid} (${lockPath})`);
    }
    await fs.rm(lockPath, { force: true });
  }

  throw new ArchiveBusy(lockPath, null);
}

export async function withLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options?: LockOptions
): Promise<T> {
  const lock = await acquireLock(lockPath, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

async function readLockState(lockPath: string, now: () => number): Promise<LockState> {
  let raw: string;
  let mtimeMs: number;
  try {
    const [content, stat] = await Promise.all([fs.readFile(lockPath, "utf-8"), fs.stat(lockPath)]);
    raw = content;
    mtimeMs = stat.mtimeMs;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return { state: "missing" };
    throw err;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    data = null;
  }
  const info = LockInfoSchema.safeParse(data);
  if (info.success) return { state: "held", info: info.data };
  return { state: "unreadable", ageMs: now() - mtimeMs };
}

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
