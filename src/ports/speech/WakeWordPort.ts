/**
 * A loaded wake-word engine bound to one keyword model.
 *
 * `process` consumes exactly `frameLength` samples of 16 kHz, 16-bit mono PCM
 * and returns the index of the matched keyword, or a negative number when
 * nothing matched.
 */
export interface WakeWordPort {
  readonly frameLength: number;
  process(frame: Int16Array): number;
  dispose(): void;
}
