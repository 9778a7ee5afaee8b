import { SequenceFileError, sequenceFileError } from "../types/errors";
import { Project, Sample, SampleSheetMetadata, SequencingRun } from "../types/sequencingRun";
import { Result, err, ok } from "../utils/result";

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Groups samples into projects in the order they first appear. The parser
 * never hands over a sample without files; one here means the parse result
 * was inconsistent.
 */
export function buildSequencingRun(
  samples: readonly Sample[],
  metadata: SampleSheetMetadata
): Result<SequencingRun, SequenceFileError> {
  const empty = samples.find((sample) => sample.files.length === 0);
  if (empty) {
    return err(
      sequenceFileError(`Sample '${empty.name}' has no sequence files after parsing`, empty.name)
    );
  }

  const projects = new Map<string, Sample[]>();
  for (const sample of samples) {
    const copy: Sample = { ...sample, files: sample.files.map((file) => ({ ...file })) };
    const list = projects.get(sample.projectId);
    if (list) {
      list.push(copy);
    } else {
      projects.set(sample.projectId, [copy]);
    }
  }

  const projectList: Project[] = [...projects].map(([id, projectSamples]) => ({
    id,
    samples: projectSamples
  }));

  return ok(
    deepFreeze({
      metadata: { ...metadata, readLengths: [...metadata.readLengths] },
      projects: projectList
    })
  );
}
