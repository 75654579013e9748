import chalk from 'chalk';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { captureConsole, createTempProject, json, type ConsoleCapture, type TempProject } from '../test-helpers/temp-project.js';
import { runCheckCommand } from './check.js';
import { runFix } from './fix.js';

const badge = [
  'export function RoleBadge({ role }: { role: string }) {',
  "  const t = useTranslations('dynamic');",
  '  return <span>{t(`roles.${role}.name`)}</span>;',
  '}',
  '',
].join('\n');

describe('fix command', () => {
  let project: TempProject;
  let output: ConsoleCapture;

  beforeEach(async () => {
    chalk.level = 0;
    project = await createTempProject({
      '.glotrc.json': json({ includes: ['src'] }),
      'messages/en.json': json({ dynamic: { roles: { admin: { name: 'Admin' }, editor: { name: 'Editor' } } } }),
      'src/RoleBadge.tsx': badge,
    });
    output = captureConsole();
  });

  afterEach(async () => {
    output.restore();
    process.exitCode = undefined;
    await project.cleanup();
  });

  it('previews the annotation without writing', async () => {
    await runFix({ cwd: project.root });

    expect(await project.read('src/RoleBadge.tsx')).toBe(badge);
    expect(output.stdout).toContain('+  // glot-message-keys ".roles.*.name"');
    expect(output.stdout.at(-2)).toBe('Would insert 1 glot-message-keys annotation in 1 file.');
  });

  it('annotates template keys so their expansions count as used', async () => {
    await runFix({ cwd: project.root, apply: true });

    expect((await project.read('src/RoleBadge.tsx')).split('\n')[2]).toBe('  // glot-message-keys ".roles.*.name"');
    expect(output.stdout[0]).toBe('Inserted 1 glot-message-keys annotation in 1 file.');

    output.stdout.length = 0;
    await runCheckCommand([], { cwd: project.root });
    expect(output.stdout).toEqual(['✓ No issues found in 1 source file and 1 locale file']);
  });

  it('reports calls it cannot annotate', async () => {
    await project.write(
      'src/label.ts',
      "const t = useTranslations();\nexport const label = (key: string) => t(key);\n"
    );

    await runFix({ cwd: project.root, apply: true });

    expect(output.stderr).toEqual([
      '\n1 edit could not be applied:',
      '  • src/label.ts (line 2): No keys to annotate key with',
    ]);
    expect(process.exitCode).toBe(1);
  });

  it('says so when there is nothing to annotate', async () => {
    await project.write('src/RoleBadge.tsx', "const t = useTranslations('dynamic');\nexport const admin = t('roles.admin.name');\n");

    await runFix({ cwd: project.root });

    expect(output.stdout).toEqual(['No unresolved dynamic keys to annotate.']);
  });
});
