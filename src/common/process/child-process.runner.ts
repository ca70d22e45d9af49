import { spawn } from 'node:child_process';
import { Injectable, Logger } from '@nestjs/common';
import { ProcessOutcome, ProcessRunner } from './process-runner.interface';

@Injectable()
export class ChildProcessRunner implements ProcessRunner {
  private readonly logger = new Logger(ChildProcessRunner.name);

  run(command: string, args: readonly string[]): Promise<ProcessOutcome> {
    this.logger.debug(`spawn: ${command} ${args.join(' ')}`);
    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        stdio: ['ignore', 'pipe', 'pipe'],
      });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));
      child.once('error', reject);
      child.once('close', (code, signal) => {
        resolve({
          exitCode: code ?? (signal ? 128 : 1),
          stdout: Buffer.concat(stdout).toString('utf8'),
          stderr: Buffer.concat(stderr).toString('utf8'),
        });
      });
    });
  }
}
