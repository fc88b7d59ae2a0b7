import fs from "node:fs";
import { vi } from "vitest";

/**
 * Make the next fs.closeSync close the descriptor and then throw EIO.
 * Undo with vi.restoreAllMocks().
 */
export function failNextClose(): void {
  const realClose = fs.closeSync;
  vi.spyOn(fs, "closeSync").mockImplementationOnce((fd) => {
    realClose(fd);
    throw Object.assign(new Error("EIO: i/o error, close"), { code: "EIO" });
  });
}
