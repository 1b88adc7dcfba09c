import { parseArgs } from '../src/cli';

describe('parseArgs', () => {
  it('should default the server URL and brightness', () => {
    expect(parseArgs(['info'])).toEqual({ command: 'info', url: 'http://localhost:3000', brightness: 100 });
  });

  it('should read options in any position', () => {
    expect(parseArgs(['-b', '40', 'test', '--url', 'http://pi.local:3000/'])).toEqual({
      command: 'test',
      url: 'http://pi.local:3000',
      brightness: 40
    });
  });

  it('should require a known command', () => {
    expect(() => parseArgs([])).toThrow('Missing command (one of: info, test, clear, discover)');
    expect(() => parseArgs(['reboot'])).toThrow('Unknown argument: reboot');
  });

  it('should reject brightness outside 0-100', () => {
    expect(() => parseArgs(['test', '--brightness', '120'])).toThrow('Brightness must be an integer between 0 and 100');
    expect(() => parseArgs(['test', '--brightness'])).toThrow('Brightness must be an integer between 0 and 100');
  });
});
