import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  AttendanceConfigError,
  DEFAULT_CONFIG_FILE,
  loadAttendanceConfig,
  parseAttendanceConfig,
} from './attendance.config';

describe('parseAttendanceConfig', () => {
  it('fills in defaults for an empty object', () => {
    expect(parseAttendanceConfig({})).toEqual({
      warningThreshold: 0,
      aliases: {},
      excludedDomains: [],
      excludedEmails: [],
      verifiedDomains: [],
      studentAttendanceOnly: true,
      weekBucketing: 'week-number',
      timestampFormat: 'd/M/yyyy H:mm:ss',
    });
  });

  it('lowercases aliases and identity lists', () => {
    const config = parseAttendanceConfig({
      aliases: { ' Ann@Personal.COM ': '1A@Student.gla.ac.uk' },
      excludedDomains: ['@GLA.ac.uk '],
      excludedEmails: ['Helper@student.gla.ac.uk'],
    });

    expect(config.aliases).toEqual({
      'ann@personal.com': '1a@student.gla.ac.uk',
    });
    expect(config.excludedDomains).toEqual(['@gla.ac.uk']);
    expect(config.excludedEmails).toEqual(['helper@student.gla.ac.uk']);
  });

  it('rejects aliases that collide after lowercasing', () => {
    expect(() =>
      parseAttendanceConfig({
        aliases: {
          'ann@personal.com': '1a@student.gla.ac.uk',
          'ANN@personal.com': '2b@student.gla.ac.uk',
        },
      }),
    ).toThrow(
      'Invalid configuration: aliases.ANN@personal.com: Alias "ANN@personal.com" duplicates "ann@personal.com"',
    );
  });

  it('lists every problem in one message', () => {
    expect(() =>
      parseAttendanceConfig(
        { warningThreshold: -1, weekBucketing: 'monthly' },
        'test.json',
      ),
    ).toThrow(AttendanceConfigError);
    expect(() =>
      parseAttendanceConfig({ warningThreshold: -1, weekBucketing: 'monthly' }),
    ).toThrow(/^Invalid configuration: warningThreshold: .+; weekBucketing: /);
  });
});

describe('loadAttendanceConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'attendance-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns defaults when the default file is absent', () => {
    expect(loadAttendanceConfig(undefined, dir).warningThreshold).toBe(0);
  });

  it('reads the default file from the working directory', () => {
    fs.writeFileSync(
      path.join(dir, DEFAULT_CONFIG_FILE),
      JSON.stringify({ warningThreshold: 3 }),
    );

    expect(loadAttendanceConfig(undefined, dir).warningThreshold).toBe(3);
  });

  it('requires an explicitly named file to exist', () => {
    expect(() => loadAttendanceConfig('missing.json', dir)).toThrow(
      `Config file not found: ${path.join(dir, 'missing.json')}`,
    );
  });

  it('reports JSON syntax errors with the file path', () => {
    fs.writeFileSync(path.join(dir, 'broken.json'), '{ "aliases": ');

    expect(() => loadAttendanceConfig('broken.json', dir)).toThrow(
      new RegExp(
        `^Could not read ${escapeRegExp(path.join(dir, 'broken.json'))}: `,
      ),
    );
  });

  it('loads the example config shipped with the project', () => {
    const example = path.resolve(
      __dirname,
      '../../../attendance.config.example.json',
    );
    const config = loadAttendanceConfig(example);

    expect(config.verifiedDomains).toEqual(['@student.gla.ac.uk']);
    expect(config.excludedDomains).toContain('@gla.ac.uk');
    expect(config.aliases).toEqual({
      'ann.smith@example.com': '1234567s@student.gla.ac.uk',
    });
  });
});

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
