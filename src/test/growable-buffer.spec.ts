import chai from "chai";
import { GrowableBuffer, MAX_BUFFER_LENGTH } from "../lib/growable-buffer";
import { bytes, errorName, getError } from "./_utils";

function write(buffer: GrowableBuffer, text: string): void {
  const data: Uint8Array = bytes(text);
  buffer.makeRoom(data.length);
  buffer.writable().set(data);
  buffer.commitWrite(data.length);
}

function windowText(buffer: GrowableBuffer): string {
  return Buffer.from(buffer.window()).toString("utf8");
}

describe("GrowableBuffer", function () {
  it("starts empty", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(16);
    chai.assert.strictEqual(buffer.capacity, 16);
    chai.assert.strictEqual(buffer.available(), 0);
    chai.assert.strictEqual(buffer.window().length, 0);
    chai.assert.strictEqual(buffer.writable().length, 16);
  });

  it("exposes committed bytes in the window", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abc");
    chai.assert.strictEqual(windowText(buffer), "abc");
    chai.assert.strictEqual(buffer.writable().length, 5);
  });

  it("returns a view, not a copy", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abc");
    const first: Uint8Array = buffer.window();
    const second: Uint8Array = buffer.window();
    chai.assert.strictEqual(first.buffer, second.buffer);
    chai.assert.strictEqual(first.byteOffset, second.byteOffset);
  });

  it("moves the consumed boundary on advance", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abcdef");
    buffer.advance(2);
    chai.assert.strictEqual(windowText(buffer), "cdef");
    chai.assert.strictEqual(buffer.consumedPos, 2);
    chai.assert.strictEqual(buffer.filledPos, 6);
    chai.assert.strictEqual(buffer.position, 2);
  });

  it("rewinds both boundaries when the window is fully consumed", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abc");
    buffer.advance(3);
    chai.assert.strictEqual(buffer.consumedPos, 0);
    chai.assert.strictEqual(buffer.filledPos, 0);
    chai.assert.strictEqual(buffer.position, 3);
    chai.assert.strictEqual(buffer.writable().length, 8);
  });

  it("rejects advancing past the filled boundary", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abc");
    const err: unknown = getError(() => buffer.advance(4));
    chai.assert.strictEqual(errorName(err), "ConsumeOverflow");
    chai.assert.strictEqual(windowText(buffer), "abc");
    chai.assert.strictEqual(buffer.position, 0);
  });

  it("rejects negative and fractional advances", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abc");
    chai.assert.strictEqual(errorName(getError(() => buffer.advance(-1))), "ConsumeOverflow");
    chai.assert.strictEqual(errorName(getError(() => buffer.advance(1.5))), "ConsumeOverflow");
    chai.assert.strictEqual(windowText(buffer), "abc");
  });

  it("compacts before growing", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abcdef");
    buffer.advance(4);
    buffer.makeRoom(4);
    chai.assert.strictEqual(buffer.capacity, 8);
    chai.assert.strictEqual(buffer.consumedPos, 0);
    chai.assert.strictEqual(buffer.filledPos, 2);
    chai.assert.strictEqual(windowText(buffer), "ef");
    chai.assert.strictEqual(buffer.position, 4);
  });

  it("does not move bytes when the tail is large enough", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(8);
    write(buffer, "abcd");
    buffer.advance(1);
    buffer.makeRoom(4);
    chai.assert.strictEqual(buffer.consumedPos, 1);
    chai.assert.strictEqual(windowText(buffer), "bcd");
  });

  it("doubles its capacity when compaction is not enough", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4);
    write(buffer, "abcd");
    buffer.makeRoom(1);
    chai.assert.strictEqual(buffer.capacity, 8);
    chai.assert.strictEqual(windowText(buffer), "abcd");
  });

  it("grows to the requested size when doubling is not enough", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4);
    write(buffer, "ab");
    buffer.makeRoom(10);
    chai.assert.strictEqual(buffer.capacity, 12);
    chai.assert.strictEqual(windowText(buffer), "ab");
  });

  it("grows from an empty storage", function () {
    const buffer: GrowableBuffer = new GrowableBuffer();
    buffer.makeRoom(3);
    chai.assert.strictEqual(buffer.capacity, 3);
  });

  it("caps the growth to the maximum capacity", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4, 6);
    write(buffer, "abcd");
    buffer.makeRoom(2);
    chai.assert.strictEqual(buffer.capacity, 6);
    chai.assert.strictEqual(windowText(buffer), "abcd");
  });

  it("fails when the unconsumed bytes cannot fit under the maximum capacity", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4, 6);
    write(buffer, "abcd");
    const err: unknown = getError(() => buffer.makeRoom(3));
    chai.assert.strictEqual(errorName(err), "BufferFull");
    chai.assert.strictEqual(buffer.capacity, 4);
    chai.assert.strictEqual(windowText(buffer), "abcd");
  });

  it("counts only unconsumed bytes against the maximum capacity", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4, 4);
    write(buffer, "abcd");
    buffer.advance(3);
    buffer.makeRoom(3);
    chai.assert.strictEqual(buffer.capacity, 4);
    chai.assert.strictEqual(windowText(buffer), "d");
    chai.assert.strictEqual(buffer.writable().length, 3);
  });

  it("rejects a commit larger than the writable tail", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4);
    write(buffer, "abc");
    const err: unknown = getError(() => buffer.commitWrite(2));
    chai.assert.strictEqual(errorName(err), "WriteOverflow");
    chai.assert.strictEqual(windowText(buffer), "abc");
  });

  it("keeps the storage when cleared", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4);
    write(buffer, "abc");
    buffer.advance(1);
    chai.assert.strictEqual(buffer.clear(), 2);
    chai.assert.strictEqual(buffer.available(), 0);
    chai.assert.strictEqual(buffer.capacity, 4);
    chai.assert.strictEqual(buffer.position, 3);
  });

  it("is bounded by the largest allocatable storage by default", function () {
    chai.assert.strictEqual(new GrowableBuffer().maxCapacity, MAX_BUFFER_LENGTH);
    chai.assert.strictEqual(new GrowableBuffer(0, Infinity).maxCapacity, MAX_BUFFER_LENGTH);
  });

  it("fails without allocating for an unbounded request", function () {
    const buffer: GrowableBuffer = new GrowableBuffer(4);
    write(buffer, "ab");
    const err: unknown = getError(() => buffer.makeRoom(Infinity));
    chai.assert.strictEqual(errorName(err), "BufferFull");
    chai.assert.strictEqual(errorName(getError(() => buffer.makeRoom(NaN))), "BufferFull");
    chai.assert.strictEqual(buffer.capacity, 4);
    chai.assert.strictEqual(windowText(buffer), "ab");
  });
});
