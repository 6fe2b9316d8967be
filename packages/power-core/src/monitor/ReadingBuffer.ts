import type { Reading } from "../readings/reading.js";

/**
 * Single-writer, append-only store of a monitor's readings.
 *
 * Every method is synchronous: on the event loop each call runs to
 * completion, so append, clear and snapshot never interleave and no call
 * is ever held across an await.
 */
export class ReadingBuffer {
    private readings: Reading[] = [];

    get length(): number {
        return this.readings.length;
    }

    append(reading: Reading): void {
        this.readings.push(reading);
    }

    clear(): void {
        this.readings = [];
    }

    /** Copy of the sequence; readings themselves are frozen and shared. */
    snapshot(): Reading[] {
        return this.readings.slice();
    }
}
