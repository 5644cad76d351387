/** Decoded RGB pixel buffer, `height * width * 3` bytes, row-major. */
export interface Frame {
  width: number;
  height: number;
  channels: 3;
  data: Buffer;
}

/** A frame as delivered by a device, in the device's native channel order. */
export interface RawFrame {
  width: number;
  height: number;
  pixelFormat: 'bgr24';
  data: Buffer;
}

/**
 * An open connection to capture hardware. Exactly one CaptureDevice owns a
 * handle; nothing else reads from it.
 */
export interface VideoHandle {
  /** Value the handle was opened with: an index or a device path / URL. */
  readonly source: number | string;
  isOpened(): boolean;
  /** Requests the number of buffered frames kept by the handle; false when not applied. */
  setBufferSize(depth: number): boolean;
  /**
   * Next frame, or null when the device produced nothing. An aborted signal
   * withdraws the pending read so it does not consume a later frame.
   */
  read(signal?: AbortSignal): Promise<RawFrame | null>;
  release(): Promise<void>;
}

export type VideoHandleOpener = (source: number | string) => Promise<VideoHandle>;
