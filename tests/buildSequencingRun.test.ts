import { describe, expect, it } from "vitest";
import { buildSequencingRun } from "../src/model/buildSequencingRun";
import { nextseqParser } from "../src/parsers/illumina";
import { parseSampleSheetText } from "../src/parsers/sampleSheet";
import { Sample, SampleSheetMetadata } from "../src/types/sequencingRun";
import { getSequencingRun } from "../src/upload/parsingHandler";

const metadata: SampleSheetMetadata = {
  runId: "run1",
  platform: "nextseq",
  layoutType: "SINGLE_END",
  readLengths: [151],
  experimentName: null,
  investigatorName: null,
  date: null,
  workflow: "GenerateFASTQ",
  application: null,
  assay: null,
  chemistry: null,
  description: null
};

function sample(name: string, projectId: string, sampleNumber: number): Sample {
  return {
    name,
    projectId,
    description: "",
    sampleNumber,
    files: [{ path: `/data/${projectId}/${name}_R1.fastq.gz`, direction: "forward" }]
  };
}

describe("sequencing run builder", () => {
  it("groups samples into projects in first-appearance order", () => {
    const built = buildSequencingRun(
      [sample("a", "76", 1), sample("b", "75", 2), sample("c", "76", 3)],
      metadata
    );

    expect(built.ok).toBe(true);
    if (!built.ok) return;
    expect(built.value.projects.map((project) => [project.id, project.samples.map((s) => s.name)])).toEqual([
      ["76", ["a", "c"]],
      ["75", ["b"]]
    ]);
    expect(Object.isFrozen(built.value.projects[0].samples[0].files)).toBe(true);
  });

  it("does not share structure with its inputs", () => {
    const input = [sample("a", "75", 1)];
    const built = buildSequencingRun(input, metadata);
    input[0].files.push({ path: "/data/extra.fastq.gz", direction: "reverse" });

    expect(built.ok ? built.value.projects[0].samples[0].files : null).toHaveLength(1);
  });

  it("refuses a sample that has no files", () => {
    const empty: Sample = { ...sample("a", "75", 1), files: [] };
    const built = buildSequencingRun([empty], metadata);

    expect(built).toEqual({
      ok: false,
      error: { kind: "SequenceFileError", message: "Sample 'a' has no sequence files after parsing", entity: "a" }
    });
  });

  it("builds structurally equal runs from the same sheet and listing", async () => {
    const sheetText = [
      "[Header]",
      "Workflow,GenerateFASTQ",
      "[Reads]",
      "151",
      "[Data]",
      "Sample_ID,Sample_Name,Sample_Project",
      "1,a,75",
      "2,b,76"
    ].join("\n");
    const dataStruct = {
      dataDir: "/cloud/run1/Data/Intensities/BaseCalls",
      entries: [
        { directory: "75", files: ["a_S1_L001_R1_001.fastq.gz"] },
        { directory: "76", files: ["b_S2_L001_R1_001.fastq.gz"] }
      ]
    };
    const sheet = parseSampleSheetText(sheetText, "/cloud/run1/SampleSheet.csv");
    const parse = async () => {
      const parsed = await nextseqParser.parseSamples(sheet, { dataStruct });
      const meta = nextseqParser.parseMetadata(sheet);
      if (!meta.ok) throw new Error(meta.error.message);
      return buildSequencingRun(parsed.samples, meta.value);
    };

    const first = await parse();
    const second = await parse();

    expect(first.ok).toBe(true);
    expect(second).toEqual(first);
    expect(second).not.toBe(first);
  });

  it("rejects an unreadable sheet with a ValidationError", async () => {
    const run = await getSequencingRun(nextseqParser, "/does/not/exist/SampleSheet.csv");

    expect(run.ok).toBe(false);
    if (run.ok) return;
    expect(run.error.kind).toBe("ValidationError");
    expect(run.error.result.errors.map((error) => error.kind)).toEqual(["SampleSheetError"]);
  });
});
