// Blocking byte channel over file descriptors.

import fs from "node:fs";
import { RpcError } from "@wirecall/core";
import type { SyncByteChannel } from "./channel.ts";

const pause = new Int32Array(new SharedArrayBuffer(4));

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Wait a millisecond before retrying a non-blocking descriptor. */
function backOff(): void {
  Atomics.wait(pause, 0, 0, 1);
}

/**
 * Reads and writes with fs.readSync/fs.writeSync. Works for pipes, FIFOs,
 * character devices and files; sockets must be obtained as raw descriptors.
 * Descriptors in non-blocking mode are polled until ready.
 */
export class FdChannel implements SyncByteChannel {
  private closed = false;

  constructor(
    private readonly readFd: number,
    private readonly writeFd: number = readFd,
  ) {}

  read(into: Uint8Array): number {
    this.ensureOpen();
    if (into.length === 0) return 0;
    for (;;) {
      try {
        return fs.readSync(this.readFd, into, 0, into.length, null);
      } catch (e) {
        if (isErrno(e, "EAGAIN")) {
          backOff();
          continue;
        }
        throw RpcError.transport(`read from fd ${this.readFd} failed`, e);
      }
    }
  }

  write(bytes: Uint8Array): void {
    this.ensureOpen();
    let written = 0;
    while (written < bytes.length) {
      try {
        written += fs.writeSync(this.writeFd, bytes, written, bytes.length - written);
      } catch (e) {
        if (isErrno(e, "EAGAIN")) {
          backOff();
          continue;
        }
        throw RpcError.transport(`write to fd ${this.writeFd} failed`, e);
      }
    }
  }

  /** Close both descriptors. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      fs.closeSync(this.readFd);
      if (this.writeFd !== this.readFd) fs.closeSync(this.writeFd);
    } catch (e) {
      throw RpcError.transport("closing descriptors failed", e);
    }
  }

  private ensureOpen(): void {
    if (this.closed) throw RpcError.transport("channel is closed");
  }
}
