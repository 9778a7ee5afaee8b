import { promises as fs } from "fs";
import path from "path";
import { describe, expect, it } from "vitest";
import { createRunDirectory, makeTempRoot, removeTempRoots } from "./helpers/runDirectory";

describe("temporary run roots", () => {
  it("are removed together with the runs created in them", async () => {
    const first = await makeTempRoot();
    const second = await makeTempRoot();
    await createRunDirectory(first, "run1", "nextseq");

    await removeTempRoots();

    await expect(fs.stat(path.join(first, "run1"))).rejects.toMatchObject({ code: "ENOENT" });
    await expect(fs.stat(second)).rejects.toMatchObject({ code: "ENOENT" });
  });
});
