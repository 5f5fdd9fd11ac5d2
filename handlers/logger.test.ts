import { afterEach, beforeEach, describe, expect, it, jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { closeLogger, configureLogger, log } from './logger';

describe('log', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stability-log-'));
    delete process.env.PROBE_DEBUG;
  });

  afterEach(async () => {
    await closeLogger();
    configureLogger();
    jest.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('prefixes the level', () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    log('probing started');
    log('probe failed', 'warn');

    expect(info).toHaveBeenCalledWith('[INFO] probing started');
    expect(warn).toHaveBeenCalledWith('[WARN] probe failed');
  });

  it('moves info lines to stderr when stdout carries the report', () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    configureLogger({ stdout: false });

    log('probing started');

    expect(info).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[INFO] probing started');
  });

  it('prints debug lines only when PROBE_DEBUG is set', () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    log('probe #1 ok', 'debug');
    process.env.PROBE_DEBUG = '1';
    log('probe #2 ok', 'debug');

    expect(info).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith('[DEBUG] probe #2 ok');
  });

  it('writes every level to the log file but prints debug only on request', async () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const filePath = path.join(dir, 'probe.log');
    configureLogger({ filePath });

    log('probe #1 ok', 'debug');
    log('run finished', 'info');
    await closeLogger();

    const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\S+Z \[DEBUG\] probe #1 ok$/);
    expect(lines[1]).toMatch(/ \[INFO\] run finished$/);
    expect(info).toHaveBeenCalledTimes(1);
  });

  it('appends to an existing log file', async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const filePath = path.join(dir, 'probe.log');
    fs.writeFileSync(filePath, 'earlier run\n', 'utf-8');
    configureLogger({ filePath });

    log('second run');
    await closeLogger();

    const lines = fs.readFileSync(filePath, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0]).toBe('earlier run');
    expect(lines[1]).toMatch(/ \[INFO\] second run$/);
  });

  it('reports a log file that cannot be opened and keeps logging to the console', async () => {
    const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const filePath = path.join(dir, 'missing', 'probe.log');
    configureLogger({ filePath });

    log('probing started');
    await closeLogger();

    expect(info).toHaveBeenCalledWith('[INFO] probing started');
    expect(error).toHaveBeenCalledWith(expect.stringMatching(/^\[ERROR\] Could not write to log file .*ENOENT/));
    expect(fs.existsSync(filePath)).toBe(false);
  });
});
