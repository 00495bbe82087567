import { PassThrough } from "node:stream";
import { describe, expect, it } from "vitest";
import { InputClosedError, InterruptError, KeyReader, withRawMode } from "./keyReader";
import { Keys } from "./keys";

class FakeTty extends PassThrough {
  isTTY = true;
  isRaw = false;
  modes: boolean[] = [];

  setRawMode(mode: boolean) {
    this.isRaw = mode;
    this.modes.push(mode);
    return this;
  }
}

describe("KeyReader", () => {
  it("reads a key in raw mode and restores the mode afterwards", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    tty.write("\x1b[A");
    await expect(reader.next()).resolves.toEqual(Keys.up);

    expect(tty.modes).toEqual([true, false]);
    expect(tty.isRaw).toBe(false);
  });

  it("queues every key from one chunk", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    tty.write("ok\r");
    expect(await reader.next()).toEqual(Keys.char("o"));
    expect(await reader.next()).toEqual(Keys.char("k"));
    expect(await reader.next()).toEqual(Keys.enter);

    expect(tty.modes).toEqual([true, false]);
  });

  it("restores the mode when the read fails", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    const pending = reader.next();
    tty.emit("error", new Error("test-failure"));

    await expect(pending).rejects.toThrow("test-failure");
    expect(tty.isRaw).toBe(false);
    expect(tty.modes).toEqual([true, false]);
  });

  it("turns ctrl-c into an InterruptError", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    tty.write("\x03");
    await expect(reader.next()).rejects.toBeInstanceOf(InterruptError);
    expect(tty.isRaw).toBe(false);
  });

  it("reports end of input", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    tty.end();
    await expect(reader.next()).rejects.toBeInstanceOf(InputClosedError);
  });

  it("reports end of input that arrived with the last chunk", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);

    tty.end("x");
    expect(await reader.next()).toEqual(Keys.char("x"));
    await expect(reader.next()).rejects.toBeInstanceOf(InputClosedError);
  });

  it("joins a character split across two chunks", async () => {
    const tty = new FakeTty();
    const reader = new KeyReader(tty);
    const bytes = Buffer.from("é");

    const pending = reader.next();
    tty.write(bytes.subarray(0, 1));
    tty.write(bytes.subarray(1));

    await expect(pending).resolves.toEqual(Keys.char("é"));
  });

  it("leaves an already-raw terminal raw", async () => {
    const tty = new FakeTty();
    tty.isRaw = true;

    await withRawMode(tty, async () => "done");
    expect(tty.modes).toEqual([true, true]);
  });

  it("doesn't touch modes on a non-tty input", async () => {
    const tty = new FakeTty();
    tty.isTTY = false;
    const reader = new KeyReader(tty);

    tty.write("x");
    expect(await reader.next()).toEqual(Keys.char("x"));
    expect(tty.modes).toEqual([]);
  });
});
