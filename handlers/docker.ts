import { execFile } from 'child_process';
import { promisify } from 'util';
import { DEFAULT_LOG_TAIL } from './config';
import { LogCollectionError } from './errors';
import { LogCollector } from '../types/probe';

const execFileAsync = promisify(execFile);

const MAX_LOG_BUFFER = 10 * 1024 * 1024;

/**
 * Collects the tail of a container's logs through the docker CLI. Docker
 * writes the container's stderr to its own stderr, so both streams are kept.
 */
export class DockerLogCollector implements LogCollector {
  private tail: number;
  private dockerBin: string;

  constructor(tail: number = DEFAULT_LOG_TAIL, dockerBin: string = process.env.DOCKER_BIN || 'docker') {
    this.tail = tail;
    this.dockerBin = dockerBin;
  }

  async collect(containerId: string): Promise<string> {
    try {
      const { stdout, stderr } = await execFileAsync(
        this.dockerBin,
        ['logs', '--tail', String(this.tail), containerId],
        { encoding: 'utf8', maxBuffer: MAX_LOG_BUFFER, timeout: 30_000 }
      );
      return [stdout, stderr].filter((chunk) => chunk.length > 0).join('\n');
    } catch (error) {
      throw new LogCollectionError(containerId, error);
    }
  }
}
