import { ComparisonResult } from '../comparison-result';
import { IResultSink } from '../result-sink';

import { durationMs, formatOutcome, formatValue } from './format';

/** Human-readable report on stdout. */
export class ConsoleResultSink implements IResultSink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  publish(result: ComparisonResult): void {
    this.write(`Experiment: ${result.experimentName}`);
    this.write(
      `Result: ${result.matched ? 'SUCCESS - Matching Values' : 'FAILURE - Different Values'}`,
    );
    this.write(`Control value: ${formatOutcome(result.control)}`);
    this.write(`Control duration: ${durationMs(result.control)}ms`);
    for (const candidate of result.candidates) {
      this.write(`Candidate: ${candidate.name}`);
      this.write(`Candidate value: ${formatOutcome(candidate)}`);
      this.write(`Candidate duration: ${durationMs(candidate)}ms`);
    }
    for (const [key, value] of Object.entries(result.contexts)) {
      this.write(`Context - ${key}: ${formatValue(value)}`);
    }
    this.write('----------------------------------');
  }
}
