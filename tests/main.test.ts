/**
 * End-to-end CLI tests: arguments in, exit code and files out.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, mkdir, readFile, writeFile, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { main } from '../src/main.js';
import { MemorySink, configureLogger } from '../src/integrations/utilities/logger.js';

describe('main', () => {
  let dir: string;
  let sink: MemorySink;
  let input: string;

  const messages = (level: 'info' | 'warn' | 'error') =>
    sink
      .getEntries({ level })
      .filter((e) => e.level === level)
      .map((e) => e.message);

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'snipshot-main-'));
    vi.stubEnv('XDG_CONFIG_HOME', join(dir, 'xdg'));
    sink = new MemorySink();
    configureLogger({ sinks: [sink] });

    input = join(dir, 'snippet.py');
    await writeFile(input, 'a = 1\nb = 2\nc = 3\n', 'utf-8');
  });

  afterEach(async () => {
    configureLogger({});
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('lists styles and exits 0', async () => {
    expect(await main(['--list-styles'], { cwd: dir })).toBe(0);
    expect(messages('info')[0]).toContain('monokai');
  });

  it('requires an output path', async () => {
    expect(await main(['-i', input], { cwd: dir })).toBe(1);
    expect(messages('error')).toEqual(['the following arguments are required: -o/--output']);
  });

  it('rejects a malformed line spec before writing anything', async () => {
    const output = join(dir, 'out.svg');
    expect(await main(['-o', output, '-H', '10-8'], { cwd: dir })).toBe(1);
    expect(messages('error')).toEqual(["Invalid range '10-8': start (10) is greater than end (8)"]);
    expect(existsSync(output)).toBe(false);
  });

  it('logs the categorized error under debug', async () => {
    configureLogger({ level: 'debug', sinks: [sink] });
    expect(await main(['-o', join(dir, 'out.svg'), '-H', '10-8'], { cwd: dir })).toBe(1);

    const debug = sink.getEntries().filter((e) => e.level === 'debug');
    expect(debug.map((e) => e.message)).toContain(
      `[InvalidRangeError] (VALIDATION) Invalid range '10-8': start (10) is greater than end (8) context={"start":10,"end":8,"token":"10-8"}`,
    );
    expect(messages('error')).toEqual(["Invalid range '10-8': start (10) is greater than end (8)"]);
  });

  it('rejects a line spec beyond the safe integer range', async () => {
    const output = join(dir, 'out.svg');
    expect(await main(['-i', input, '-o', output, '-H', '1-100000000000000000000'], { cwd: dir })).toBe(1);
    expect(messages('error')).toEqual([
      "Invalid range format '1-100000000000000000000': line number too large: '100000000000000000000'",
    ]);
    expect(existsSync(output)).toBe(false);
  });

  it('rejects an unsupported format', async () => {
    expect(await main(['-i', input, '-o', join(dir, 'out.svg'), '-f', 'png'], { cwd: dir })).toBe(1);
    expect(messages('error')).toEqual(['Unsupported format: png']);
  });

  it('rejects empty input', async () => {
    const empty = join(dir, 'empty.py');
    await writeFile(empty, '\n  \n', 'utf-8');
    expect(await main(['-i', empty, '-o', join(dir, 'out.svg')], { cwd: dir })).toBe(1);
    expect(messages('error')).toEqual(['No code provided']);
  });

  it('rejects an invalid highlight color', async () => {
    const code = await main(['-i', input, '-o', join(dir, 'out.svg'), '--highlight-color', 'yellow'], {
      cwd: dir,
    });
    expect(code).toBe(1);
    expect(messages('error')[0]).toContain('highlightColor');
  });

  it('renders a highlighted SVG', async () => {
    const output = join(dir, 'out.svg');
    expect(await main(['-i', input, '-o', output, '-l', 'python', '-H', '2'], { cwd: dir })).toBe(0);

    const svg = await readFile(output, 'utf-8');
    expect((svg.match(/<rect /g) ?? []).length).toBe(1);
    expect(svg).toContain('fill="#ffffcc" fill-opacity="0.3"/><text x="48" y="30"');
    expect(messages('info')).toEqual([`SVG saved to: ${output}`, 'Language: Python', 'Style: monokai']);
  });

  it('renders HTML with an opaque background', async () => {
    const output = join(dir, 'out.html');
    expect(await main(['-i', input, '-o', output, '-l', 'py', '--opaque-background'], { cwd: dir })).toBe(0);

    const html = await readFile(output, 'utf-8');
    expect(html).toMatch(/^<div class="highlight" style="background: #[0-9a-fA-F]+">/);
    expect(html).toContain('<pre style="line-height: 125%;">');
  });

  it('applies project config defaults', async () => {
    await mkdir(join(dir, '.snipshot'), { recursive: true });
    await writeFile(join(dir, '.snipshot', 'config.json'), JSON.stringify({ style: 'github-dark' }));

    const output = join(dir, 'out.svg');
    expect(await main(['-i', input, '-o', output, '-l', 'python'], { cwd: dir })).toBe(0);
    expect(messages('info')).toContain('Style: github-dark');
  });

  it('lets flags override config files', async () => {
    await mkdir(join(dir, '.snipshot'), { recursive: true });
    await writeFile(join(dir, '.snipshot', 'config.json'), JSON.stringify({ style: 'github-dark' }));

    const output = join(dir, 'out.svg');
    expect(await main(['-i', input, '-o', output, '-l', 'python', '-s', 'nord'], { cwd: dir })).toBe(0);
    expect(messages('info')).toContain('Style: nord');
  });

  it('warns about invalid config entries and keeps rendering', async () => {
    await mkdir(join(dir, '.snipshot'), { recursive: true });
    await writeFile(join(dir, '.snipshot', 'config.json'), JSON.stringify({ fontSize: -1 }));

    const output = join(dir, 'out.svg');
    expect(await main(['-i', input, '-o', output, '-l', 'python'], { cwd: dir })).toBe(0);
    expect(messages('warn')[0]).toMatch(/^config validation: fontSize — /);
    expect(await readFile(output, 'utf-8')).toContain('font-size="14px"');
  });
});
