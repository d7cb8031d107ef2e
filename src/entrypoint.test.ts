/**
 * Process start-up: exit codes for bad flags and unusable TLS material.
 * Spawns the entrypoint under the tsx loader.
 */

import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { spawnSync } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { EXIT_CONFIG, EXIT_RUNTIME } from './constants.js';

const projectRoot = fileURLToPath(new URL('..', import.meta.url));
const entrypoint = fileURLToPath(new URL('./entrypoint.ts', import.meta.url));

function childEnv(): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith('NODE_TEST')) env[key] = value;
  }
  return env;
}

function run(args: string[]) {
  const result = spawnSync(process.execPath, ['--import', 'tsx', entrypoint, ...args], {
    cwd: projectRoot,
    env: childEnv(),
    encoding: 'utf8',
    timeout: 30_000,
  });
  return { status: result.status, stderr: result.stderr };
}

function errorLine(stderr: string): string {
  const line = stderr.split('\n').find((l) => l.includes('level=error'));
  assert.ok(line, stderr);
  return line;
}

describe('entrypoint', () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), 'exporter-sidecar-webhook-'));
    await writeFile(join(dir, 'cert.pem'), 'not a certificate\n');
    await writeFile(join(dir, 'key.pem'), 'not a key\n');
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('exits with the config code on an unknown log format', () => {
    const { status, stderr } = run(['--log-format', 'xml']);
    assert.equal(status, EXIT_CONFIG);
    const line = stderr.split('\n').find((l) => l.startsWith('{'));
    assert.ok(line, stderr);
    const record = JSON.parse(line);
    assert.equal(record.level, 'error');
    assert.equal(record.message, "Invalid config: log format 'xml' is not recognized");
    assert.equal(record.field, 'logFormat');
  });

  it('exits with the config code on an unknown flag', () => {
    assert.equal(run(['--verbose']).status, EXIT_CONFIG);
  });

  it('exits with the runtime code when the certificate file is missing', () => {
    const { status, stderr } = run(['--cert', join(dir, 'missing.pem'), '--key', join(dir, 'key.pem')]);
    assert.equal(status, EXIT_RUNTIME);
    const line = errorLine(stderr);
    assert.ok(line.includes(' msg="Failed to load key pair" '), line);
    assert.ok(line.includes(`cert=${join(dir, 'missing.pem')}`), line);
  });

  it('reports a malformed key pair as a key-pair error in the configured format', () => {
    const { status, stderr } = run(['--cert', join(dir, 'cert.pem'), '--key', join(dir, 'key.pem')]);
    assert.equal(status, EXIT_RUNTIME);
    const line = errorLine(stderr);
    assert.ok(line.includes(' msg="Failed to load key pair" '), line);
    assert.ok(line.includes('PEM routines'), line);
  });
});
