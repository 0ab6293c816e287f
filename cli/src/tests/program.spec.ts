import { describe, it, expect } from 'vitest';
import { CLI_VERSION, createProgram } from '../program.js';
import { captureIO, fixture } from './fixtures/io.js';

const planFile = fixture('plan.yaml');

describe('createProgram', () => {
  it('registers the commands', () => {
    const program = createProgram(captureIO());

    expect(program.name()).toBe('gridplan');
    expect(program.version()).toBe(CLI_VERSION);
    expect(program.commands.map((command) => command.name())).toEqual(['validate', 'classify', 'run']);
  });

  it('parses validate arguments and records the exit code', async () => {
    const io = captureIO();

    await createProgram(io).parseAsync(['node', 'gridplan', 'validate', planFile, '--no-color']);

    expect(io.exitCodes).toEqual([0]);
    expect(io.stdout).toEqual([`✔ Plan is valid: ${planFile}`]);
  });

  it('parses repeated inputs and options for run', async () => {
    const io = captureIO();

    await createProgram(io).parseAsync([
      'node',
      'gridplan',
      'run',
      planFile,
      '--scenario',
      'LineB tripped',
      '--input',
      'line=LineB',
      '--fixtures',
      fixture('fixtures.yaml'),
      '--timeout',
      '5s',
      '--format',
      'json',
      '--silent',
    ]);

    expect(io.exitCodes).toEqual([0]);
    expect(io.stdout).toHaveLength(1);
    expect(JSON.parse(io.stdout[0])).toMatchObject({ type: 'result', finalOutputs: { P_lim: 2750 } });
  });
});
