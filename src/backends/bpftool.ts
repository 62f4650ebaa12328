import { execFile } from 'child_process';
import * as path from 'path';
import { promisify } from 'util';
import { z } from 'zod';
import type { CounterBackend } from '../backend';
import { DatarecCodec } from '../codec';
import { possibleCpuCount, POSSIBLE_CPUS_PATH } from '../cpus';
import { BackendUnavailableError, CounterReadError, errorMessage } from '../errors';
import type { CounterMap } from '../protocol';
import type { DataPoint } from '../record';
import { logger } from '../utils/logger';

/** Kernel object names are 16 bytes including the NUL terminator. */
export const BPF_OBJ_NAME_LEN = 15;

export type ExecFn = (
  file: string,
  args: string[],
  options: { timeout?: number }
) => Promise<{ stdout: string; stderr: string }>;

const execFileAsync = promisify(execFile);

const defaultExec: ExecFn = (file, args, options) =>
  execFileAsync(file, args, { encoding: 'utf8', timeout: options.timeout ?? 0 });

const hexByte = z.string().regex(/^0x[0-9a-f]{1,2}$/i, 'expected a hex byte');

const lookupReplySchema = z.union([
  z.object({ error: z.string() }),
  z.object({
    key: z.array(hexByte),
    values: z.array(z.object({
      cpu: z.number().int().nonnegative(),
      value: z.array(hexByte),
    })),
  }),
]);

export type LookupReply = z.infer<typeof lookupReplySchema>;

export interface BpftoolOptions {
  /** bpftool binary, resolved through PATH when not absolute. */
  bin?: string;
  /** bpffs directory where the maps are pinned; maps are looked up by name otherwise. */
  pinDir?: string;
  /** Per-lookup timeout. No timeout when unset. */
  timeoutMs?: number;
  cpusPath?: string;
  exec?: ExecFn;
}

/**
 * Reads per-CPU counter maps through `bpftool -j map lookup`.
 */
export class BpftoolBackend implements CounterBackend {
  private readonly bin: string;
  private readonly pinDir?: string;
  private readonly timeoutMs?: number;
  private readonly cpusPath: string;
  private readonly exec: ExecFn;
  private cpus: number | null = null;

  constructor(options: BpftoolOptions = {}) {
    this.bin = options.bin ?? 'bpftool';
    this.pinDir = options.pinDir;
    this.timeoutMs = options.timeoutMs;
    this.cpusPath = options.cpusPath ?? POSSIBLE_CPUS_PATH;
    this.exec = options.exec ?? defaultExec;
  }

  /** Fails fast when bpftool cannot be executed at all. */
  async verify(): Promise<void> {
    try {
      const { stdout } = await this.exec(this.bin, ['version'], { timeout: this.timeoutMs });
      logger.debug(`Using ${stdout.split('\n')[0].trim()}`);
    } catch (err) {
      throw new BackendUnavailableError(`cannot run ${this.bin}: ${errorMessage(err)}`);
    }
  }

  possibleCpus(): number {
    if (this.cpus === null) {
      this.cpus = possibleCpuCount(this.cpusPath);
    }
    return this.cpus;
  }

  lookupArgs(map: CounterMap, key: number): string[] {
    const target = this.pinDir
      ? ['pinned', path.join(this.pinDir, map)]
      : ['name', map.slice(0, BPF_OBJ_NAME_LEN)];
    return ['-j', 'map', 'lookup', ...target, 'key', 'hex', ...DatarecCodec.keyHex(key)];
  }

  async lookup(map: CounterMap, key: number): Promise<DataPoint[]> {
    let stdout: string;
    try {
      ({ stdout } = await this.exec(this.bin, this.lookupArgs(map, key), { timeout: this.timeoutMs }));
    } catch (err) {
      throw new CounterReadError(map, key, errorMessage(err));
    }
    return BpftoolBackend.parseLookup(map, key, stdout);
  }

  static parseLookup(map: CounterMap, key: number, stdout: string): DataPoint[] {
    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new CounterReadError(map, key, 'bpftool returned invalid JSON');
    }

    const result = lookupReplySchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
      throw new CounterReadError(map, key, `unexpected bpftool reply (${issues.join('; ')})`);
    }

    const reply = result.data;
    if ('error' in reply) {
      throw new CounterReadError(map, key, reply.error);
    }

    return reply.values.map(entry => {
      const point = DatarecCodec.decode(DatarecCodec.fromHexBytes(entry.value));
      if (!point) {
        throw new CounterReadError(map, key, `value for cpu ${entry.cpu} is ${entry.value.length} bytes`);
      }
      return point;
    });
  }
}
