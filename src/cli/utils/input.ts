import { createInterface } from 'readline';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({
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

export async function promptConfirm(question: string, defaultValue: boolean = false): Promise<boolean> {
  const defaultText = defaultValue ? 'Y/n' : 'y/N';
  const answer = await promptUser(`${question} (${defaultText}): `);

  if (answer.length === 0) {
    return defaultValue;
  }

  return answer.toLowerCase().startsWith('y');
}

/**
 * Ask for a comma-separated list, keeping the default when the answer is blank
 */
export async function promptList(question: string, defaultValue: string[]): Promise<string[]> {
  const shown = defaultValue.length > 0 ? defaultValue.join(', ') : 'none';
  const answer = await promptUser(`${question} [${shown}]: `);

  if (answer.length === 0) {
    return defaultValue;
  }

  return parseList(answer);
}

export async function promptNumber(question: string, defaultValue: number): Promise<number> {
  while (true) {
    const answer = await promptUser(`${question} [${defaultValue}]: `);

    if (answer === '') {
      return defaultValue;
    }

    const value = Number(answer);
    if (Number.isFinite(value) && value > 0) {
      return value;
    }

    console.log('Please enter a positive number');
  }
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}
