import { directoryParser } from "./directory";
import { miseqParser, nextseqParser } from "./illumina";
import { ParserName, RunParser } from "./types";

const PARSERS: Record<ParserName, RunParser> = {
  nextseq: nextseqParser,
  miseq: miseqParser,
  directory: directoryParser
};

export function getParser(name: ParserName): RunParser {
  return PARSERS[name];
}
