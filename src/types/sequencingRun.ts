export type LayoutType = "PAIRED_END" | "SINGLE_END";

export type ReadDirection = "forward" | "reverse";

export interface SampleSheetMetadata {
  runId: string;
  platform: string;
  layoutType: LayoutType;
  readLengths: number[];
  experimentName: string | null;
  investigatorName: string | null;
  date: string | null;
  workflow: string | null;
  application: string | null;
  assay: string | null;
  chemistry: string | null;
  description: string | null;
}

export interface SequenceFile {
  path: string;
  direction: ReadDirection;
}

export interface Sample {
  name: string;
  projectId: string;
  description: string;
  sampleNumber: number;
  files: SequenceFile[];
}

export interface Project {
  id: string;
  samples: readonly Sample[];
}

export interface SequencingRun {
  metadata: SampleSheetMetadata;
  projects: readonly Project[];
}
