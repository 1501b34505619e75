import * as readline from 'readline';
import { ENVIRONMENTS } from './core/types';

export const WELCOME =
  'Welcome to the release sanity checker. This tool checks for differences in endpoint ' +
  'responses before and after a release. It will now collect responses from the configured ' +
  'endpoints (see the configuration file to know more).\n';

export const ENVIRONMENT_PROMPT = `Insert environment to run the query on: (${ENVIRONMENTS.join(', ')}):\n`;

/**
 * Ask the operator for an environment. Resolves with the raw answer,
 * or '' when the input ends first.
 */
export function promptEnvironment(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output, terminal: false });
  output.write(`${WELCOME}\n`);

  return new Promise((resolve) => {
    rl.on('close', () => resolve(''));
    rl.question(ENVIRONMENT_PROMPT, (answer) => {
      resolve(answer);
      rl.close();
    });
  });
}
