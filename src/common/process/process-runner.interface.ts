export const PROCESS_RUNNER_TOKEN = 'PROCESS_RUNNER_TOKEN';

export type ProcessOutcome = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export interface ProcessRunner {
  run(command: string, args: readonly string[]): Promise<ProcessOutcome>;
}
