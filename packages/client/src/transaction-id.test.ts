import { describe, expect, it } from "vitest";
import { TRANSACTION_ID_SIZE, TransactionId } from "./transaction-id.js";

const SEQUENTIAL = new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]);

describe("TransactionId", () => {
  it("renders its bytes as lowercase hex", () => {
    expect(TransactionId.fromBytes(SEQUENTIAL).toHex()).toBe("0102030405060708090a0b0c");
  });

  it("rejects byte arrays that are not 96 bits", () => {
    expect(() => TransactionId.fromBytes(new Uint8Array(11))).toThrow(
      "Transaction id must be 12 bytes, got 11"
    );
    expect(() => TransactionId.fromBytes(new Uint8Array(16))).toThrow(RangeError);
  });

  it("parses hex case-insensitively and compares by value", () => {
    const fromHex = TransactionId.fromHex("0102030405060708090A0B0C");
    expect(fromHex.equals(TransactionId.fromBytes(SEQUENTIAL))).toBe(true);
    expect(fromHex.equals(TransactionId.fromHex("0102030405060708090a0b0d"))).toBe(false);
  });

  it("rejects malformed hex", () => {
    expect(() => TransactionId.fromHex("xyz")).toThrow("Invalid transaction id hex: xyz");
  });

  it("copies its input and output bytes", () => {
    const input = SEQUENTIAL.slice();
    const id = TransactionId.fromBytes(input);
    input[0] = 0xff;
    const exposed = id.bytes;
    exposed[1] = 0xff;
    expect(id.toHex()).toBe("0102030405060708090a0b0c");
  });

  it("generates random ids of the right size", () => {
    const a = TransactionId.random();
    const b = TransactionId.random();
    expect(a.bytes.byteLength).toBe(TRANSACTION_ID_SIZE);
    expect(a.equals(b)).toBe(false);
  });
});
