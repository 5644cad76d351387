import { spawn, execFile, type ChildProcessByStdio } from 'child_process';
import type { Readable } from 'stream';
import { promisify } from 'util';
import { z } from 'zod';
import { DEVICE_PATH_PREFIX } from '../source-identity';
import { FrameQueue } from './frame-queue';
import type { RawFrame, VideoHandle } from './types';
import type { Logger } from '../../observability/types';
import { rootLogger } from '../../observability/logger';

const execFileAsync = promisify(execFile);

const PROBE_TIMEOUT_MS = 10_000;
const RELEASE_TIMEOUT_MS = 3_000;
const BYTES_PER_PIXEL = 3; // bgr24

export interface FfmpegInput {
  /** Arguments placed before the output options, ending with `-i <input>`. */
  args: string[];
  /** What gets logged for this input. */
  label: string;
}

/**
 * Maps a capture source onto ffmpeg input options. Indices and /dev/video*
 * paths use the platform camera demuxer; anything else (RTSP/HTTP URL, file)
 * is handed to ffmpeg as-is.
 */
export function resolveFfmpegInput(source: number | string, platform: NodeJS.Platform = process.platform): FfmpegInput {
  if (typeof source === 'number') {
    if (platform === 'darwin') {
      return { args: ['-f', 'avfoundation', '-i', String(source)], label: `avfoundation:${source}` };
    }
    const devicePath = `${DEVICE_PATH_PREFIX}${source}`;
    return { args: ['-f', 'v4l2', '-i', devicePath], label: devicePath };
  }

  if (source.toLowerCase().startsWith(DEVICE_PATH_PREFIX)) {
    return { args: ['-f', 'v4l2', '-i', source], label: source };
  }
  return { args: ['-i', source], label: source };
}

export function buildStreamArgs(input: FfmpegInput): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    ...input.args,
    '-an',
    '-f', 'rawvideo',
    '-pix_fmt', 'bgr24',
    'pipe:1',
  ];
}

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().int().positive(),
        height: z.number().int().positive(),
      })
    )
    .min(1),
});

/** Native frame size of the first video stream, as reported by ffprobe. */
export async function probeNativeSize(
  input: FfmpegInput,
  ffprobePath = 'ffprobe'
): Promise<{ width: number; height: number }> {
  const { stdout } = await execFileAsync(
    ffprobePath,
    [
      '-v', 'error',
      ...input.args.slice(0, -2),
      '-select_streams', 'v:0',
      '-show_entries', 'stream=width,height',
      '-of', 'json',
      input.args[input.args.length - 1] ?? input.label,
    ],
    { timeout: PROBE_TIMEOUT_MS }
  );

  const parsed = probeSchema.safeParse(JSON.parse(stdout));
  if (!parsed.success) {
    throw new Error(`ffprobe reported no usable video stream for ${input.label}`);
  }
  const [stream] = parsed.data.streams;
  if (!stream) {
    throw new Error(`ffprobe reported no video stream for ${input.label}`);
  }
  return stream;
}

export interface FfmpegHandleOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  logger?: Logger;
}

/**
 * Keeps one ffmpeg process streaming raw bgr24 frames from the device. Frames
 * pile up in a bounded queue while nobody reads, which is why callers discard
 * a few warm-up reads before trusting a frame.
 */
export class FfmpegVideoHandle implements VideoHandle {
  private proc: ChildProcessByStdio<null, Readable, Readable> | null = null;
  private exited = false;
  private readonly queue: FrameQueue;
  private readonly logger: Logger;

  private constructor(
    readonly source: number | string,
    private readonly input: FfmpegInput,
    readonly width: number,
    readonly height: number,
    logger: Logger
  ) {
    this.logger = logger;
    this.queue = new FrameQueue(width * height * BYTES_PER_PIXEL);
  }

  static async open(source: number | string, options: FfmpegHandleOptions = {}): Promise<FfmpegVideoHandle> {
    const logger = (options.logger ?? rootLogger).child({ component: 'ffmpeg' });
    const input = resolveFfmpegInput(source);
    const { width, height } = await probeNativeSize(input, options.ffprobePath);

    const handle = new FfmpegVideoHandle(source, input, width, height, logger);
    handle.spawn(options.ffmpegPath ?? 'ffmpeg');
    return handle;
  }

  private spawn(ffmpegPath: string): void {
    const proc = spawn(ffmpegPath, buildStreamArgs(this.input), {
      stdio: ['ignore', 'pipe', 'pipe'],
    });
    this.proc = proc;

    proc.stdout.on('data', (chunk: Buffer) => this.queue.push(chunk));

    proc.stderr.setEncoding('utf8');
    proc.stderr.on('data', (text: string) => {
      if (text.trim()) {
        this.logger.warn(text.trim(), { input: this.input.label });
      }
    });

    proc.on('error', (err) => {
      this.logger.error('ffmpeg process error', err, { input: this.input.label });
      this.exited = true;
      this.queue.close();
    });

    proc.on('exit', (code, signal) => {
      this.exited = true;
      this.queue.close();
      this.logger.debug('ffmpeg exited', { input: this.input.label, code, signal });
    });
  }

  isOpened(): boolean {
    return this.proc !== null && !this.exited;
  }

  setBufferSize(depth: number): boolean {
    if (!Number.isInteger(depth) || depth < 1 || !this.isOpened()) {
      return false;
    }
    this.queue.setCapacity(depth);
    return true;
  }

  async read(signal?: AbortSignal): Promise<RawFrame | null> {
    if (!this.isOpened()) return null;
    const data = await this.queue.next(signal);
    if (!data) return null;
    return { width: this.width, height: this.height, pixelFormat: 'bgr24', data };
  }

  async release(): Promise<void> {
    const proc = this.proc;
    this.proc = null;
    this.queue.close();
    if (!proc || this.exited) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        proc.kill('SIGKILL');
        resolve();
      }, RELEASE_TIMEOUT_MS);
      proc.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      proc.kill('SIGTERM');
    });
  }
}

export const openFfmpegHandle = (options: FfmpegHandleOptions = {}) =>
  (source: number | string): Promise<VideoHandle> => FfmpegVideoHandle.open(source, options);
