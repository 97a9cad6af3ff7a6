import { CliUsageError, parseArgs } from './parse-args';

describe('parseArgs', () => {
  it('should split the command, positionals and flags', () => {
    expect(
      parseArgs(['fake', '--region', '3301', '--count=5', 'extra']),
    ).toEqual({
      command: 'fake',
      positionals: ['extra'],
      flags: { region: '3301', count: '5' },
    });
  });

  it('should return an empty parse for no arguments', () => {
    expect(parseArgs([])).toEqual({
      command: undefined,
      positionals: [],
      flags: {},
    });
  });

  it('should reject a flag without a value', () => {
    expect(() => parseArgs(['fake', '--region'])).toThrow(CliUsageError);
    expect(() => parseArgs(['fake', '--region', '--count', '2'])).toThrow(
      'Missing value for --region',
    );
  });
});
