import { describe, it, expect } from 'vitest';
import { buildStreamArgs, resolveFfmpegInput } from './ffmpeg';

describe('ffmpeg input mapping', () => {
  it('should open numeric sources as V4L2 devices on linux', () => {
    expect(resolveFfmpegInput(2, 'linux')).toEqual({
      args: ['-f', 'v4l2', '-i', '/dev/video2'],
      label: '/dev/video2',
    });
  });

  it('should use avfoundation for numeric sources on macOS', () => {
    expect(resolveFfmpegInput(0, 'darwin')).toEqual({
      args: ['-f', 'avfoundation', '-i', '0'],
      label: 'avfoundation:0',
    });
  });

  it('should pass device paths through the V4L2 demuxer', () => {
    expect(resolveFfmpegInput('/dev/video1', 'linux').args).toEqual(['-f', 'v4l2', '-i', '/dev/video1']);
  });

  it('should hand any other source to ffmpeg unchanged', () => {
    expect(resolveFfmpegInput('rtsp://camera.local/live', 'linux').args).toEqual(['-i', 'rtsp://camera.local/live']);
  });

  it('should stream raw bgr24 frames to stdout', () => {
    const args = buildStreamArgs({ args: ['-i', 'clip.mp4'], label: 'clip.mp4' });
    expect(args).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-i', 'clip.mp4',
      '-an',
      '-f', 'rawvideo',
      '-pix_fmt', 'bgr24',
      'pipe:1',
    ]);
  });
});
