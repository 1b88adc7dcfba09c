import { CommandRunner, lastLine, runCommand } from '../../utils/commandRunner';
import { PluginDescriptor, booleanSetting, numberSetting, stringSetting } from '../types';

// Split an argument string on whitespace, honouring double quotes
export function splitArgs(input: string): string[] {
  const args: string[] = [];
  const pattern = /"([^"]*)"|(\S+)/g;
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(input)) !== null) {
    args.push(match[1] ?? match[2]);
  }
  return args;
}

export function createScriptPlugin(run: CommandRunner = runCommand): PluginDescriptor {
  return {
    id: 'script.run',
    name: 'Run Script',
    description: 'Run an executable or script file',
    category: 'system',
    icon: 'terminal',
    configSchema: {
      type: 'object',
      properties: {
        path: { type: 'string', minLength: 1, description: 'Absolute path of the executable' },
        args: { type: 'string', default: '', description: 'Arguments, space separated' },
        timeout_seconds: { type: 'integer', default: 30, minimum: 1, maximum: 3600, description: 'Kill the script after this long' },
        show_output: { type: 'boolean', default: false, description: 'Show the last output line on the key' }
      },
      required: ['path']
    },
    async execute(context, config) {
      const file = stringSetting(config, 'path');
      const args = splitArgs(stringSetting(config, 'args'));
      const timeoutMs = numberSetting(config, 'timeout_seconds', 30) * 1000;

      console.log(`[Plugins] Running script ${file} ${args.join(' ')}`.trim());
      const output = await run(file, args, { timeoutMs, signal: context.signal });
      const summary = lastLine(output.stdout);

      if (output.exitCode !== 0) {
        return {
          success: false,
          message: lastLine(output.stderr) || summary || `exit code ${output.exitCode}`
        };
      }

      const result = { success: true, message: summary || 'Script finished' };
      if (booleanSetting(config, 'show_output', false) && summary) {
        return { ...result, display: summary };
      }
      return result;
    }
  };
}
