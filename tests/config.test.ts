import assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  config,
  parseBoolean,
  parseInteger,
  parseLogFormat,
  parseLogLevel,
  parsePort,
  serverVersion,
} from '../src/config.js';

describe('config parsers', () => {
  it('parses bounded integers with a fallback', () => {
    assert.equal(parseInteger('250', 10), 250);
    assert.equal(parseInteger(undefined, 10), 10);
    assert.equal(parseInteger('soon', 10), 10);
    assert.equal(parseInteger('0', 10, 1), 10);
    assert.equal(parseInteger('99', 10, 1, 50), 10);
  });

  it('treats anything but "false" as true', () => {
    assert.equal(parseBoolean('true', false), true);
    assert.equal(parseBoolean(' FALSE ', true), false);
    assert.equal(parseBoolean(undefined, true), true);
    assert.equal(parseBoolean('', false), false);
  });

  it('falls back to info for unknown log levels', () => {
    assert.equal(parseLogLevel('DEBUG'), 'debug');
    assert.equal(parseLogLevel('verbose'), 'info');
    assert.equal(parseLogLevel(undefined), 'info');
  });

  it('selects json output only when asked', () => {
    assert.equal(parseLogFormat('json'), 'json');
    assert.equal(parseLogFormat(' JSON '), 'json');
    assert.equal(parseLogFormat('pretty'), 'text');
  });

  it('accepts unprivileged ports and zero', () => {
    assert.equal(parsePort('8080'), 8080);
    assert.equal(parsePort('0'), 0);
    assert.equal(parsePort('80'), 3000);
    assert.equal(parsePort(undefined), 3000);
  });
});

describe('config', () => {
  it('reads the package version', () => {
    assert.match(serverVersion, /^\d+\.\d+\.\d+/);
    assert.equal(config.server.version, serverVersion);
    assert.equal(config.server.name, 'logged-http');
  });
});
