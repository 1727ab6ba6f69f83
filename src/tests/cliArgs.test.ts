import { parseCliArgs } from '../cliArgs';
import { SelectionError, UsageError } from '../utils/errors';

describe('parseCliArgs', () => {
  it('should default every flag', () => {
    expect(parseCliArgs([])).toEqual({
      selection: {},
      skipExisting: false,
      verbose: false,
      help: false,
    });
  });

  it('should read selection flags in both spellings', () => {
    const options = parseCliArgs(['--range', '200-250', '--sequence=12', '--book-id', 'abc-123']);

    expect(options.selection).toEqual({ range: '200-250', sequence: 12, bookId: 'abc-123' });
  });

  it('should read the legacy table, item and limit flags', () => {
    const options = parseCliArgs(['--table', '1', '--item', '5', '--limit', '10', '--single=3']);

    expect(options.selection).toEqual({ table: 1, item: 5, limit: 10, single: 3 });
  });

  it('should read output, config and switches', () => {
    const options = parseCliArgs(['-o', './books', '--config=./alt.json', '--skip-existing', '-v', '-h']);

    expect(options).toEqual({
      selection: {},
      outputDir: './books',
      configPath: './alt.json',
      skipExisting: true,
      verbose: true,
      help: true,
    });
  });

  it('should reject integer flags with other values', () => {
    expect(() => parseCliArgs(['--sequence', 'ten'])).toThrow(
      '--sequence expects a non-negative integer, got "ten"'
    );
    expect(() => parseCliArgs(['--limit=-2'])).toThrow(SelectionError);
  });

  it('should reject a flag without its value', () => {
    expect(() => parseCliArgs(['--range'])).toThrow('--range requires a value');
    expect(() => parseCliArgs(['--table', '--item', '2'])).toThrow(UsageError);
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--parallel', '4'])).toThrow('Unknown option: --parallel');
  });
});
