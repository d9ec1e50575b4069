import {
  MIN_RESPONSE_LENGTH,
  RESPONSE_MARKER_OFFSET,
  RESPONSE_MARKER_VALUE,
} from "./constants";

/*
  Rebuilds status frames from BLE notifications.
  - a packet with the marker at byte[2] starts a new response (drops any partial)
  - other packets are continuation fragments while accumulating, noise while idle
  - once minLength bytes are buffered the frame is emitted and the buffer cleared
  A marker byte inside a continuation fragment would restart accumulation;
  the device is not known to do that.
*/
export class NotificationReassembler {
  private buf: Buffer = Buffer.alloc(0);
  private accumulating = false;

  constructor(
    private onFrame: (frame: Buffer) => void,
    private minLength = MIN_RESPONSE_LENGTH
  ) {}

  get isAccumulating() {
    return this.accumulating;
  }

  get buffered() {
    return this.buf.length;
  }

  push(chunk: Buffer) {
    if (
      chunk.length > RESPONSE_MARKER_OFFSET &&
      chunk[RESPONSE_MARKER_OFFSET] === RESPONSE_MARKER_VALUE
    ) {
      this.buf = Buffer.from(chunk);
      this.accumulating = true;
    } else if (this.accumulating) {
      this.buf = Buffer.concat([this.buf, chunk]);
    } else {
      console.debug(`BLE: ignoring non-status notification (${chunk.length} bytes)`);
      return;
    }

    if (this.buf.length < this.minLength) {
      console.debug(`BLE: buffered ${this.buf.length}/${this.minLength} bytes`);
      return;
    }

    const frame = this.buf;
    this.reset();
    this.onFrame(frame);
  }

  reset() {
    this.buf = Buffer.alloc(0);
    this.accumulating = false;
  }
}
