/**
 * Byte-stream contracts between the responder and its host.
 *
 * Input: per receive tick either no byte, or a sample whose `active` flag
 * frames the stream (low→high = start of frame, high→low = end of frame).
 * Output: per transmit tick a sample, answered by the downstream with an
 * acknowledge.
 */

export interface ByteSample {
  readonly data: number;
  readonly active: boolean;
}

export const IDLE_SAMPLE: ByteSample = Object.freeze({ data: 0, active: false });

export interface ByteSource {
  /** `undefined` when no byte is available this tick */
  next(): ByteSample | undefined;
}

export interface ByteSink {
  /** Returns the acknowledge for the presented sample */
  accept(sample: ByteSample): boolean;
}

/**
 * Consumer side of a parser: receives whole validated frames
 */
export interface FrameSink<F> {
  enqueue(frame: F): boolean;
}

/**
 * Producer side of a sender: hands out whole frames
 */
export interface FrameSource<F> {
  isEmpty(): boolean;
  dequeue(): F | undefined;
}
