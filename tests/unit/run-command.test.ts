import { Readable } from 'node:stream';
import { afterEach, describe, expect, test, vi } from 'vitest';
import { createRunCommand, executeRun, type RunOptions } from '../../src/commands/run.js';
import { setDebugLevel } from '../../src/utils/debug.js';
import { output } from '../../src/utils/output.js';

const defaults: RunOptions = { validate: true, outputFormat: 'text' };

describe('executeRun', () => {
  test('should run an operation from named flags', async () => {
    const output = await executeRun('convert-case', defaults, {
      commanderOpts: { validate: true, outputFormat: 'text' },
      commanderArgs: ['convert-case', '--text', 'myVarName123', '--style', 'snake_case'],
    });

    expect(output).toEqual({ content: 'my_var_name123', exitCode: 0 });
  });

  test('should run an operation from --json', async () => {
    const output = await executeRun(
      'find-replace',
      {
        ...defaults,
        json: '{"text":"Hello HELLO hello","find":"hello","replace":"hi","caseSensitive":false}',
      },
      { commanderOpts: {}, commanderArgs: ['find-replace'] },
    );

    expect(output.content).toBe('hi hi hi');
  });

  test('should run an operation from stdin', async () => {
    const output = await executeRun(
      'word-count',
      { ...defaults, stdin: true, outputFormat: 'json' },
      {
        commanderOpts: {},
        commanderArgs: ['word-count'],
        stdin: Readable.from([Buffer.from('{"text":"one two"}')]),
      },
    );

    expect(JSON.parse(output.content)).toEqual({
      success: true,
      operation: 'word-count',
      result: { words: 2, characters: 7, charactersNoSpaces: 6, lines: 1, paragraphs: 1 },
    });
  });

  test('should reject unknown operations', async () => {
    await expect(
      executeRun('rot13', defaults, { commanderOpts: {}, commanderArgs: ['rot13'] }),
    ).rejects.toThrow("Operation 'rot13' not found");
  });

  test('should reject unknown output formats', async () => {
    await expect(
      executeRun(
        'reverse',
        { ...defaults, outputFormat: 'yaml' },
        { commanderOpts: {}, commanderArgs: ['reverse', '--text', 'x'] },
      ),
    ).rejects.toThrow("Unknown output format 'yaml'. Use one of: text, json, raw");
  });

  test('should list every schema violation', async () => {
    const run = executeRun('sort-lines', defaults, {
      commanderOpts: {},
      commanderArgs: ['sort-lines', '--ascending', 'maybe'],
    });

    await expect(run).rejects.toThrow("Invalid arguments for operation 'sort-lines':\n");
    await expect(run).rejects.toThrow("  - Missing required property: 'text'");
    await expect(run).rejects.toThrow("  - Property '/ascending' must be of type boolean");
  });

  test('should fall back to handler checks with --no-validate', async () => {
    await expect(
      executeRun(
        'sort-lines',
        { ...defaults, validate: false },
        { commanderOpts: {}, commanderArgs: ['sort-lines', '--text', 'a', '--ascending', 'maybe'] },
      ),
    ).rejects.toThrow("Argument 'ascending' must be a boolean");
  });
});

describe('createRunCommand', () => {
  test('should declare the run options', () => {
    const command = createRunCommand();
    const flags = command.options.map((option) => option.long);

    expect(command.name()).toBe('run');
    expect(flags).toEqual([
      '--json',
      '--stdin',
      '--file',
      '--no-validate',
      '--output-format',
      '--quiet',
      '--verbose',
    ]);
  });
});

describe('run output levels', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    output.setLevel('normal');
    setDebugLevel(0);
  });

  test('should warn about unknown styles', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await createRunCommand().parseAsync(['convert-case', '--text', 'abc', '--style', 'nope'], {
      from: 'user',
    });

    expect(log.mock.calls).toEqual([['abc']]);
    expect(warn.mock.calls).toEqual([["Warning: Unknown style 'nope', text returned unchanged"]]);
  });

  test('should print only the result with --quiet', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await createRunCommand().parseAsync(
      ['convert-case', '-q', '--text', 'abc', '--style', 'nope'],
      { from: 'user' },
    );

    expect(log.mock.calls).toEqual([['abc']]);
    expect(warn).not.toHaveBeenCalled();
  });

  test('should warn when validation is skipped', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    await createRunCommand().parseAsync(['reverse', '--no-validate', '--text', 'abc'], {
      from: 'user',
    });

    expect(warn.mock.calls).toEqual([['Warning: Schema validation skipped (--no-validate)']]);
  });

  test('should print step details with --verbose', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    await createRunCommand().parseAsync(['reverse', '-v', '--text', 'abc'], { from: 'user' });

    expect(log.mock.calls).toEqual([['cba']]);
    expect(error).toHaveBeenCalledWith('[DEBUG] Arguments read from flags');
  });
});
