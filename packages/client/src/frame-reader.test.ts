import { describe, expect, it } from "vitest";
import { ConnectionClosedError } from "./errors.js";
import { FrameReader } from "./frame-reader.js";
import { createFakeConnection } from "./test-utils/fake-connection.js";

describe("FrameReader", () => {
  it("serves buffered bytes immediately", async () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);
    fake.push(new Uint8Array([1, 2, 3, 4, 5]));

    expect(Array.from(await reader.readExact(3))).toEqual([1, 2, 3]);
    expect(reader.bufferedBytes).toBe(2);
    expect(Array.from(await reader.readExact(2))).toEqual([4, 5]);
  });

  it("waits until enough bytes arrive", async () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);

    const read = reader.readExact(4);
    fake.push(new Uint8Array([9, 8]));
    fake.push(new Uint8Array([7, 6, 5]));

    expect(Array.from(await read)).toEqual([9, 8, 7, 6]);
    expect(reader.bufferedBytes).toBe(1);
  });

  it("allows a single outstanding read", async () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);

    const first = reader.readExact(1);
    await expect(reader.readExact(1)).rejects.toThrow("FrameReader already has a pending read");
    fake.push(new Uint8Array([1]));
    expect(Array.from(await first)).toEqual([1]);
  });

  it("rejects the pending read when the connection closes", async () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);

    const read = reader.readExact(4);
    fake.emitClose(new Error("peer reset"));

    await expect(read).rejects.toBeInstanceOf(ConnectionClosedError);
    await expect(reader.readExact(1)).rejects.toThrow("Connection closed: peer reset");
    expect(reader.closed).toBe(true);
  });

  it("still drains buffered bytes after close", async () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);
    fake.push(new Uint8Array([1, 2]));
    reader.end();

    expect(Array.from(await reader.readExact(2))).toEqual([1, 2]);
    await expect(reader.readExact(1)).rejects.toThrow("Connection closed");
  });

  it("discards everything buffered", () => {
    const fake = createFakeConnection();
    const reader = new FrameReader(fake.connection);
    fake.push(new Uint8Array(6));
    fake.push(new Uint8Array(3));

    expect(reader.discardBuffered()).toBe(9);
    expect(reader.bufferedBytes).toBe(0);
  });
});
