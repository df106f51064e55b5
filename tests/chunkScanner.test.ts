import { describe, it, expect, vi } from "vitest";
import { processChunk, scanChunk } from "../src/services/chunkScanner";
import { createAddressClassifier } from "../src/utils/ipClassification";

const bytes = (text: string) => Buffer.from(text, "latin1");

describe("scanChunk", () => {
  it("should return each distinct address once", () => {
    const found = scanChunk(bytes("req from 10.0.0.5 and 8.8.8.8 and 10.0.0.5 failed"));
    expect([...found]).toEqual(["10.0.0.5", "8.8.8.8"]);
  });

  it("should find addresses at the very start and end of the chunk", () => {
    expect([...scanChunk(bytes("1.1.1.1 middle 2.2.2.2"))]).toEqual(["1.1.1.1", "2.2.2.2"]);
  });

  it("should reject literals glued to letters or longer digit runs", () => {
    expect(scanChunk(bytes("abc1.2.3.4")).size).toBe(0);
    expect(scanChunk(bytes("1.2.3.4abc")).size).toBe(0);
    expect(scanChunk(bytes("id=1234.1.1.1")).size).toBe(0);
    expect(scanChunk(bytes("v1_10.0.0.1")).size).toBe(0);
  });

  it("should reject octets above 255", () => {
    expect(scanChunk(bytes("256.1.1.1 and 1.1.1.256 and 999.1.1.1")).size).toBe(0);
  });

  it("should stop at a dot following the fourth octet", () => {
    expect([...scanChunk(bytes("version 1.2.3.4.5"))]).toEqual(["1.2.3.4"]);
  });

  it("should match across punctuation typical of log lines", () => {
    const line = 'client="192.168.1.20",upstream=[203.0.113.7]:443;via(10.1.1.1)';
    expect([...scanChunk(bytes(line))]).toEqual(["192.168.1.20", "203.0.113.7", "10.1.1.1"]);
  });

  it("should tolerate bytes that are not valid UTF-8", () => {
    const chunk = Buffer.concat([
      Buffer.from([0xff, 0xfe]),
      bytes("10.1.2.3"),
      Buffer.from([0xc3]),
      bytes(" 8.8.4.4"),
      Buffer.from([0x80, 0x00]),
    ]);
    expect([...scanChunk(chunk)]).toEqual(["10.1.2.3", "8.8.4.4"]);
  });

  it("should respect the byte range of a view into a larger buffer", () => {
    const whole = bytes("xx 1.1.1.1 yy 2.2.2.2");
    expect([...scanChunk(whole.subarray(3, 10))]).toEqual(["1.1.1.1"]);
  });

  it("should accept a plain Uint8Array", () => {
    const chunk = new TextEncoder().encode("from 172.16.0.9 to 9.9.9.9");
    expect([...scanChunk(chunk)]).toEqual(["172.16.0.9", "9.9.9.9"]);
  });

  it("should keep leading-zero literals as written", () => {
    expect([...scanChunk(bytes("host 010.001.002.003 up"))]).toEqual(["010.001.002.003"]);
  });
});

describe("processChunk", () => {
  const classify = createAddressClassifier();

  it("should partition candidates and drop invalid ones", () => {
    const chunk = bytes("10.0.0.5 8.8.8.8 0.0.0.0 224.0.0.1 127.0.0.1 10.0.0.5 192.168.7.7");
    expect(processChunk(chunk, classify)).toEqual({
      privateIps: ["10.0.0.5", "192.168.7.7"],
      publicIps: ["8.8.8.8", "127.0.0.1"],
    });
  });

  it("should classify each distinct candidate once", () => {
    const spy = vi.fn(classify);
    processChunk(bytes("1.1.1.1 1.1.1.1 1.1.1.1 2.2.2.2"), spy);
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("should return empty lists for a chunk without addresses", () => {
    expect(processChunk(bytes("GET /index.html 200"), classify)).toEqual({
      privateIps: [],
      publicIps: [],
    });
  });
});
