import { mkdir, readFile, rename, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { Timer } from "../types.js";

export interface TimerStorage {
  load(): Promise<Timer[]>;
  save(timers: Timer[]): Promise<void>;
}

const timerRecordSchema = z.object({
  id: z.string().min(1),
  owner: z.string().min(1),
  label: z.string(),
  durationSeconds: z.number().int(),
  status: z.enum(["running", "completed", "canceled"]),
  startedAt: z.string(),
  endsAt: z.string(),
  completedAt: z.string().nullable(),
  canceledAt: z.string().nullable(),
  createdAt: z.string(),
  updatedAt: z.string(),
  version: z.number().int().positive()
});

const timerFileSchema = z.array(timerRecordSchema);

export class TimerFileStorage implements TimerStorage {
  private pending = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<Timer[]> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    }

    const parsed = timerFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Timer file ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? "unknown issue"}`);
    }
    return parsed.data;
  }

  async save(timers: Timer[]): Promise<void> {
    const serialized = JSON.stringify(timers, null, 2);
    const tempPath = `${this.filePath}.tmp`;
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(tempPath, serialized, "utf-8");
        await rename(tempPath, this.filePath);
      });
    await this.pending;
  }
}
