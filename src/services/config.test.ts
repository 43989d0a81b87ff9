// Tests for configuration loading
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadConfig, defaultConfigPath, defaultStateDir, nicknameTable, applyEnvOverrides } from './config';

describe('Config', () => {
  let dir: string;

  function writeConfig(name: string, contents: string): string {
    const file = path.join(dir, name);
    fs.writeFileSync(file, contents);
    return file;
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pokem-config-'));
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('should read a YAML config file', () => {
    const file = writeConfig(
      'config.yaml',
      [
        'matrix:',
        '  homeserver_url: https://matrix.example.org',
        '  username: pokem',
        '  password: test-password',
        '  room_size_limit: 50',
        'daemon:',
        '  port: 8080',
        'rooms:',
        "  default: '!ops:example.org'",
        "  dev: '#dev:example.org'",
        '',
      ].join('\n')
    );

    const config = loadConfig(file, {});
    expect(config.matrix).toEqual({
      homeserver_url: 'https://matrix.example.org',
      username: 'pokem',
      password: 'test-password',
      room_size_limit: 50,
    });
    expect(config.daemon).toEqual({ port: 8080 });
    expect(nicknameTable(config).get('default')).toBe('!ops:example.org');
    expect(nicknameTable(config).get('dev')).toBe('#dev:example.org');
  });

  it('should still read a config written as JSON', () => {
    const file = writeConfig(
      'config.json',
      JSON.stringify({
        matrix: { homeserver_url: 'https://matrix.example.org', username: 'pokem', password: 'test-password' },
        daemon: { port: 8080 },
        rooms: { default: '!ops:example.org', dev: '#dev:example.org' },
      })
    );

    const config = loadConfig(file, {});
    expect(config.matrix?.username).toBe('pokem');
    expect(config.daemon).toEqual({ port: 8080 });
    expect(nicknameTable(config).get('dev')).toBe('#dev:example.org');
  });

  it('should treat a missing file as an empty config', () => {
    expect(loadConfig(path.join(dir, 'missing.json'), {})).toEqual({});
  });

  it('should find the file through POKEM_CONFIG', () => {
    const file = writeConfig('other.json', JSON.stringify({ server: { url: 'pokem.example.org' } }));
    expect(loadConfig(undefined, { POKEM_CONFIG: file })).toEqual({ server: { url: 'pokem.example.org' } });
  });

  it('should let the environment override the file', () => {
    const file = writeConfig(
      'config.json',
      JSON.stringify({ matrix: { homeserver_url: 'https://matrix.example.org', username: 'pokem' } })
    );
    const config = loadConfig(file, { POKEM_USERNAME: 'notifier', POKEM_ACCESS_TOKEN: 'test-token', POKEM_PORT: '9000' });
    expect(config.matrix).toEqual({
      homeserver_url: 'https://matrix.example.org',
      username: 'notifier',
      access_token: 'test-token',
    });
    expect(config.daemon).toEqual({ port: 9000 });
  });

  it('should build the matrix section from the environment alone', () => {
    expect(
      applyEnvOverrides({}, { POKEM_HOMESERVER_URL: 'https://matrix.example.org', POKEM_USERNAME: 'pokem' })
    ).toEqual({ matrix: { homeserver_url: 'https://matrix.example.org', username: 'pokem' } });
  });

  it('should treat an empty file as an empty config', () => {
    expect(loadConfig(writeConfig('config.yaml', ''), {})).toEqual({});
  });

  it('should reject a file that is not YAML', () => {
    const file = writeConfig('config.yaml', 'matrix: [unclosed\n');
    expect(() => loadConfig(file, {})).toThrow(`Config file ${file} is not valid YAML`);
  });

  it('should reject a config that does not match the schema', () => {
    const file = writeConfig('config.json', JSON.stringify({ matrix: { homeserver_url: 'nowhere', username: 'pokem' } }));
    expect(() => loadConfig(file, {})).toThrow(/^Invalid config in .*: matrix\.homeserver_url: /);
  });

  it('should follow the XDG directories', () => {
    expect(defaultConfigPath({ XDG_CONFIG_HOME: '/xdg/config' })).toBe(path.join('/xdg/config', 'pokem', 'config.yaml'));
    expect(defaultStateDir({ XDG_STATE_HOME: '/xdg/state' })).toBe(path.join('/xdg/state', 'pokem'));
  });
});
