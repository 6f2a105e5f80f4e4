import { describe, expect } from 'vitest';
import { it } from '@fast-check/vitest';
import * as fc from 'fast-check';
import { createPolicyConfig } from './config.js';
import {
  PolicyEngine,
  detectPlatform,
  evaluateCommand,
  evaluatePathEdit,
} from './policy-engine.js';
import {
  Platform,
  PolicyDecision,
  type PartialPolicyConfig,
  type PathEnvironment,
} from './types.js';

const posixEnv: PathEnvironment = {
  home: '/home/tester',
  env: { HOME: '/home/tester' },
};

const windowsEnv: PathEnvironment = {
  home: 'C:\\Users\\tester',
  env: { USERPROFILE: 'C:\\Users\\tester' },
};

function posixEngine(partial: PartialPolicyConfig): PolicyEngine {
  return new PolicyEngine(createPolicyConfig(partial), {
    platform: Platform.POSIX,
    environment: posixEnv,
  });
}

const ALLOW = { decision: PolicyDecision.ALLOW };

const sampleConfig = createPolicyConfig({
  genericRules: [
    { pattern: '\\bsudo\\b', reason: 'elevated privileges', ask: true },
    { pattern: 'git\\s+push\\s+--force', reason: 'force push', ask: false },
  ],
  zeroAccessPaths: ['~/.ssh', '*.pem'],
  readOnlyPaths: ['/etc/', '*.lock'],
  noDeletePaths: ['.git/', 'README*'],
});

const blankArb = fc
  .array(fc.constantFrom(' ', '\t', '\n'), { maxLength: 5 })
  .map((chars) => chars.join(''));

const platformArb = fc.constantFrom(Platform.POSIX, Platform.WINDOWS);

describe('PolicyEngine', () => {
  describe('scenarios', () => {
    it('blocks an in-place edit of a read-only file', () => {
      const config = createPolicyConfig({ readOnlyPaths: ['/etc/hosts'] });

      expect(
        evaluateCommand(
          "sudo sed -i 's/a/b/' /etc/hosts",
          config,
          Platform.POSIX,
        ),
      ).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'edit operation on read-only path /etc/hosts',
        tier: 'read-only',
        pattern: '/etc/hosts',
        operation: 'edit',
      });
    });

    it('blocks any reference to a zero-access glob', () => {
      const config = createPolicyConfig({ zeroAccessPaths: ['~/.ssh/*'] });

      expect(
        evaluateCommand('cat ~/.ssh/id_rsa', config, Platform.POSIX),
      ).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'zero-access path ~/.ssh/* (no operations allowed)',
        tier: 'zero-access',
        pattern: '~/.ssh/*',
      });
    });

    it('blocks deleting a no-delete file', () => {
      const config = createPolicyConfig({
        noDeletePaths: ['/var/log/app.log'],
      });

      expect(
        evaluateCommand('rm -f /var/log/app.log', config, Platform.POSIX),
      ).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'delete operation on no-delete path /var/log/app.log',
        tier: 'no-delete',
        pattern: '/var/log/app.log',
        operation: 'delete',
      });
    });

    it('allows reading a no-delete file', () => {
      const config = createPolicyConfig({
        noDeletePaths: ['/var/log/app.log'],
      });

      expect(
        evaluateCommand('tail -f /var/log/app.log', config, Platform.POSIX),
      ).toEqual(ALLOW);
    });

    it('blocks editing a file under a read-only glob', () => {
      const config = createPolicyConfig({ readOnlyPaths: ['/etc/*'] });

      expect(evaluatePathEdit('/etc/passwd', config, Platform.POSIX)).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'read-only path /etc/*',
        tier: 'read-only',
        pattern: '/etc/*',
      });
    });

    it('asks for a generic ask rule', () => {
      const config = createPolicyConfig({
        genericRules: [
          { pattern: '\\bsudo\\b', ask: true, reason: 'elevated privileges' },
        ],
      });

      expect(evaluateCommand('sudo ls', config, Platform.POSIX)).toEqual({
        decision: PolicyDecision.ASK,
        reason: 'elevated privileges',
        pattern: '\\bsudo\\b',
      });
    });
  });

  describe('empty input', () => {
    it.prop([blankArb, platformArb])(
      'allows blank commands and paths',
      (input, platform) => {
        expect(evaluateCommand(input, sampleConfig, platform)).toEqual(ALLOW);
        expect(evaluatePathEdit(input, sampleConfig, platform)).toEqual(ALLOW);
      },
    );
  });

  describe('generic rules', () => {
    it('blocks when ask is false', () => {
      expect(
        posixEngine({
          genericRules: [
            { pattern: 'git\\s+push\\s+--force', reason: 'force push', ask: false },
          ],
        }).evaluateCommand('git push --force origin main'),
      ).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'force push',
        tier: 'generic',
        pattern: 'git\\s+push\\s+--force',
      });
    });

    it('matches case-insensitively', () => {
      const engine = posixEngine({
        genericRules: [{ pattern: 'drop table', reason: 'sql', ask: false }],
      });

      expect(engine.evaluateCommand('psql -c "DROP TABLE users"').decision).toBe(
        PolicyDecision.BLOCK,
      );
    });

    it('uses the first matching rule', () => {
      const engine = posixEngine({
        genericRules: [
          { pattern: 'rm', reason: 'first', ask: true },
          { pattern: 'rm\\s+-rf', reason: 'second', ask: false },
        ],
      });

      expect(engine.evaluateCommand('rm -rf build')).toEqual({
        decision: PolicyDecision.ASK,
        reason: 'first',
        pattern: 'rm',
      });
    });

    it('skips a rule whose pattern does not compile', () => {
      const engine = posixEngine({
        genericRules: [
          { pattern: '(', reason: 'broken', ask: false },
          { pattern: '\\bsudo\\b', reason: 'elevated privileges', ask: true },
        ],
      });

      expect(engine.evaluateCommand('sudo ls').decision).toBe(
        PolicyDecision.ASK,
      );
      expect(engine.evaluateCommand('ls (')).toEqual(ALLOW);
    });
  });

  describe('zero-access paths', () => {
    it.prop([
      fc.constantFrom('/etc/shadow', '/srv/secrets/db.env', '/opt/keys'),
      fc.constantFrom('cat', 'echo', 'ls -la', 'grep x', 'cp'),
      fc.constantFrom('', ' | head', ' > /tmp/out', ' && true'),
    ])(
      'blocks a command that mentions the path in any context',
      (path, prefix, suffix) => {
        const engine = posixEngine({ zeroAccessPaths: [path] });

        expect(engine.evaluateCommand(`${prefix} ${path}${suffix}`)).toEqual({
          decision: PolicyDecision.BLOCK,
          reason: `zero-access path ${path} (no operations allowed)`,
          tier: 'zero-access',
          pattern: path,
        });
      },
    );

    it('matches the expanded spelling of a home path', () => {
      const engine = posixEngine({ zeroAccessPaths: ['~/.ssh'] });

      expect(
        engine.evaluateCommand('cat /home/tester/.ssh/id_rsa').decision,
      ).toBe(PolicyDecision.BLOCK);
    });

    it('skips a malformed glob and keeps checking the rest', () => {
      const engine = posixEngine({
        zeroAccessPaths: ['key[1', '/etc/shadow'],
      });

      expect(engine.evaluateCommand('cat key[1')).toEqual(ALLOW);
      expect(engine.evaluateCommand('cat /etc/shadow')).toMatchObject({
        decision: PolicyDecision.BLOCK,
        pattern: '/etc/shadow',
      });
    });

    it('ignores names that only appear inside another word', () => {
      const engine = posixEngine({ zeroAccessPaths: ['.env*'] });

      expect(
        engine.evaluateCommand('node -e "console.log(process.env.HOME)"'),
      ).toEqual(ALLOW);
      expect(engine.evaluateCommand('cat .env.local')).toMatchObject({
        decision: PolicyDecision.BLOCK,
        pattern: '.env*',
      });
      expect(engine.evaluateCommand('cat ./config/.env')).toMatchObject({
        decision: PolicyDecision.BLOCK,
        tier: 'zero-access',
      });
    });

    it('is outranked by a generic ask rule', () => {
      const engine = posixEngine({
        genericRules: [{ pattern: '^cat\\b', reason: 'review reads', ask: true }],
        zeroAccessPaths: ['/etc/shadow'],
      });

      expect(engine.evaluateCommand('cat /etc/shadow')).toEqual({
        decision: PolicyDecision.ASK,
        reason: 'review reads',
        pattern: '^cat\\b',
      });
    });
  });

  describe('read-only paths', () => {
    const readOnlyPathArb = fc.constantFrom(
      '/etc/hosts',
      '/srv/app/config.yml',
      '/opt/data/db.sqlite',
    );

    it.prop([
      readOnlyPathArb,
      fc.constantFrom(
        ['echo x > ', 'write'],
        ['rm ', 'delete'],
        ['mv a ', 'move'],
        ['chmod 600 ', 'chmod'],
      ),
    ])('blocks write-class commands', (path, [prefix, operation]) => {
      const engine = posixEngine({ readOnlyPaths: [path] });

      expect(engine.evaluateCommand(`${prefix}${path}`)).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: `${operation} operation on read-only path ${path}`,
        tier: 'read-only',
        pattern: path,
        operation,
      });
    });

    it.prop([readOnlyPathArb])('allows a pure read', (path) => {
      const engine = posixEngine({ readOnlyPaths: [path] });

      expect(engine.evaluateCommand(`cat ${path}`)).toEqual(ALLOW);
    });

    it('wins over no-delete for the same path', () => {
      const engine = posixEngine({
        readOnlyPaths: ['/data/keep'],
        noDeletePaths: ['/data/keep'],
      });

      expect(engine.evaluateCommand('rm /data/keep')).toMatchObject({
        tier: 'read-only',
        reason: 'delete operation on read-only path /data/keep',
      });
    });

    it('reports the first matching entry in configured order', () => {
      const broadFirst = posixEngine({ readOnlyPaths: ['/etc/', '/etc/hosts'] });
      const narrowFirst = posixEngine({
        readOnlyPaths: ['/etc/hosts', '/etc/'],
      });

      expect(broadFirst.evaluateCommand('rm /etc/hosts')).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'delete operation on read-only path /etc/',
        tier: 'read-only',
        pattern: '/etc/',
        operation: 'delete',
      });
      expect(narrowFirst.evaluateCommand('rm /etc/hosts')).toMatchObject({
        reason: 'delete operation on read-only path /etc/hosts',
        pattern: '/etc/hosts',
      });
    });

    it('loses to zero-access for the same path', () => {
      const engine = posixEngine({
        readOnlyPaths: ['/srv/vault'],
        zeroAccessPaths: ['/srv/vault'],
      });

      expect(engine.evaluateCommand('echo x > /srv/vault')).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'zero-access path /srv/vault (no operations allowed)',
        tier: 'zero-access',
        pattern: '/srv/vault',
      });
      expect(engine.evaluatePathEdit('/srv/vault')).toMatchObject({
        tier: 'zero-access',
      });
    });

    it('protects files matched by a basename glob', () => {
      const engine = posixEngine({ readOnlyPaths: ['*.lock'] });

      expect(engine.evaluateCommand('echo x > yarn.lock')).toMatchObject({
        decision: PolicyDecision.BLOCK,
        operation: 'write',
        pattern: '*.lock',
      });
    });
  });

  describe('no-delete paths', () => {
    const noDeletePathArb = fc.constantFrom(
      '/var/log/app.log',
      '/repo/LICENSE',
    );

    it.prop([noDeletePathArb])('blocks rm', (path) => {
      const engine = posixEngine({ noDeletePaths: [path] });

      expect(engine.evaluateCommand(`rm ${path}`)).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: `delete operation on no-delete path ${path}`,
        tier: 'no-delete',
        pattern: path,
        operation: 'delete',
      });
    });

    it.prop([noDeletePathArb])('allows appending', (path) => {
      const engine = posixEngine({ noDeletePaths: [path] });

      expect(engine.evaluateCommand(`echo x >> ${path}`)).toEqual(ALLOW);
    });
  });

  describe('evaluatePathEdit', () => {
    const engine = posixEngine({
      zeroAccessPaths: ['~/.ssh'],
      readOnlyPaths: ['/etc/'],
      noDeletePaths: ['README*'],
    });

    it('blocks zero-access paths', () => {
      expect(engine.evaluatePathEdit('/home/tester/.ssh/config')).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'zero-access path ~/.ssh',
        tier: 'zero-access',
        pattern: '~/.ssh',
      });
    });

    it('blocks read-only paths', () => {
      expect(engine.evaluatePathEdit('/etc/nginx/nginx.conf')).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'read-only path /etc/',
        tier: 'read-only',
        pattern: '/etc/',
      });
    });

    it('allows editing no-delete paths', () => {
      expect(engine.evaluatePathEdit('/repo/README.md')).toEqual(ALLOW);
    });

    it('allows unrelated paths', () => {
      expect(engine.evaluatePathEdit('/repo/src/index.ts')).toEqual(ALLOW);
    });
  });

  describe('Windows', () => {
    const engine = new PolicyEngine(
      createPolicyConfig({
        zeroAccessPaths: ['%USERPROFILE%\\.aws'],
        readOnlyPaths: ['C:\\Windows\\'],
      }),
      { platform: Platform.WINDOWS, environment: windowsEnv },
    );

    it('uses the native delete syntax', () => {
      expect(
        engine.evaluateCommand(
          'Remove-Item C:\\Windows\\System32\\drivers\\etc\\hosts',
        ),
      ).toEqual({
        decision: PolicyDecision.BLOCK,
        reason: 'delete operation on read-only path C:\\Windows\\',
        tier: 'read-only',
        pattern: 'C:\\Windows\\',
        operation: 'delete',
      });
    });

    it('matches both spellings of a variable path', () => {
      expect(
        engine.evaluateCommand('type C:\\Users\\tester\\.aws\\credentials')
          .decision,
      ).toBe(PolicyDecision.BLOCK);
      expect(
        engine.evaluateCommand('type %USERPROFILE%\\.aws\\credentials')
          .decision,
      ).toBe(PolicyDecision.BLOCK);
    });

    it('compares edit paths case-insensitively', () => {
      expect(engine.evaluatePathEdit('c:\\windows\\win.ini')).toMatchObject({
        decision: PolicyDecision.BLOCK,
        tier: 'read-only',
      });
    });
  });

  describe('determinism', () => {
    it.prop([fc.string({ maxLength: 60 }), platformArb])(
      'returns equal decisions for equal arguments',
      (command, platform) => {
        expect(evaluateCommand(command, sampleConfig, platform)).toEqual(
          evaluateCommand(command, sampleConfig, platform),
        );
        expect(evaluatePathEdit(command, sampleConfig, platform)).toEqual(
          evaluatePathEdit(command, sampleConfig, platform),
        );
      },
    );
  });

  describe('defaults', () => {
    it('allows everything with an empty configuration', () => {
      const engine = new PolicyEngine();

      expect(engine.evaluateCommand('rm -rf /')).toEqual(ALLOW);
      expect(engine.evaluatePathEdit('/etc/passwd')).toEqual(ALLOW);
      expect(engine.getConfig().genericRules).toEqual([]);
    });

    it('detects the platform from the Node.js platform name', () => {
      expect(detectPlatform('win32')).toBe(Platform.WINDOWS);
      expect(detectPlatform('linux')).toBe(Platform.POSIX);
      expect(detectPlatform('darwin')).toBe(Platform.POSIX);
    });
  });
});
