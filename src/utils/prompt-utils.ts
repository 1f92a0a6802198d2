import * as readline from 'readline';

function ask(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Prompt user for input
 * Non-interactive stdin (pipes, CI) takes the default without asking
 */
export async function prompt(question: string, defaultValue = ''): Promise<string> {
  if (!process.stdin.isTTY) {
    return defaultValue;
  }

  const promptText = defaultValue
    ? `${question} [${defaultValue}]: `
    : `${question}: `;

  const answer = await ask(promptText);
  return answer || defaultValue;
}

/**
 * Prompt user for yes/no confirmation
 * Non-interactive stdin answers with the default
 */
export async function confirm(question: string, defaultYes = true): Promise<boolean> {
  if (!process.stdin.isTTY) {
    return defaultYes;
  }

  const suffix = defaultYes ? '[Y/n]' : '[y/N]';
  const input = (await ask(`${question} ${suffix}: `)).toLowerCase();

  if (input === '') {
    return defaultYes;
  }
  return input === 'y' || input === 'yes';
}
