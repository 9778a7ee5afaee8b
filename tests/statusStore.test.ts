import { promises as fs } from "fs";
import path from "path";
import { afterEach, describe, expect, it } from "vitest";
import {
  STATUS_FILE_NAME,
  clearDirectoryStatus,
  readDirectoryStatus,
  writeDirectoryStatus
} from "../src/progress/statusStore";
import { makeTempRoot, removeTempRoots } from "./helpers/runDirectory";

afterEach(removeTempRoots);

describe("status store", () => {
  it("reads NEW when no marker exists", async () => {
    const dir = await makeTempRoot();
    expect(await readDirectoryStatus(dir)).toBe("NEW");
  });

  it("persists the last written status as a single token", async () => {
    const dir = await makeTempRoot();
    expect((await writeDirectoryStatus(dir, "PARTIAL")).ok).toBe(true);
    expect((await writeDirectoryStatus(dir, "COMPLETE")).ok).toBe(true);

    expect(await readDirectoryStatus(dir)).toBe("COMPLETE");
    expect(await fs.readFile(path.join(dir, STATUS_FILE_NAME), "utf8")).toBe("COMPLETE\n");
    expect(await fs.readdir(dir)).toEqual([STATUS_FILE_NAME]);
  });

  it("fails with a DirectoryError when the directory does not exist", async () => {
    const dir = path.join(await makeTempRoot(), "missing");
    const result = await writeDirectoryStatus(dir, "PARTIAL");

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("DirectoryError");
    expect(result.error.entity).toBe(dir);
  });

  it("keeps the previous status when the marker cannot be replaced", async () => {
    const dir = await makeTempRoot();
    await fs.mkdir(path.join(dir, STATUS_FILE_NAME));

    const result = await writeDirectoryStatus(dir, "PARTIAL");

    expect(result.ok).toBe(false);
    expect(await fs.readdir(dir)).toEqual([STATUS_FILE_NAME]);
  });

  it("reads a marker with unknown content as ERROR", async () => {
    const dir = await makeTempRoot();
    await fs.writeFile(path.join(dir, STATUS_FILE_NAME), "INVALID\n", "utf8");
    expect(await readDirectoryStatus(dir)).toBe("ERROR");
  });

  it("clears the marker so the directory reads as NEW again", async () => {
    const dir = await makeTempRoot();
    await writeDirectoryStatus(dir, "ERROR");

    expect((await clearDirectoryStatus(dir)).ok).toBe(true);
    expect(await readDirectoryStatus(dir)).toBe("NEW");
  });
});
