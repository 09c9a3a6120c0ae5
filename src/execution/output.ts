/**
 * Byte-capped capture buffer for a child process stream.
 * Bytes past the cap are counted and dropped; the rendered text ends with a marker.
 */
export class BoundedOutput {
    private readonly chunks: Buffer[] = [];
    private kept = 0;
    private dropped = 0;

    constructor(private readonly limit: number) {}

    push(chunk: Buffer): void {
        const room = this.limit - this.kept;
        if (room <= 0 || this.dropped > 0) {
            this.dropped += chunk.length;
            return;
        }
        const part = chunk.length <= room ? chunk : chunk.subarray(0, utf8Boundary(chunk, room));
        this.chunks.push(part);
        this.kept += part.length;
        this.dropped += chunk.length - part.length;
    }

    get truncated(): boolean {
        return this.dropped > 0;
    }

    get droppedBytes(): number {
        return this.dropped;
    }

    toString(): string {
        const text = Buffer.concat(this.chunks).toString("utf-8");
        if (!this.truncated) return text;
        return `${text}\n...[truncated ${this.dropped} bytes]`;
    }
}

/** Largest cut position `<= at` that does not split a UTF-8 sequence. */
function utf8Boundary(chunk: Buffer, at: number): number {
    let cut = at;
    // 10xxxxxx continuation bytes never start a character
    while (cut > 0 && (chunk[cut] & 0xc0) === 0x80) cut--;
    return cut;
}
