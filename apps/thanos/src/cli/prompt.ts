import { createInterface } from 'node:readline/promises';

/**
 * 標準入力から1行読み取る
 */
export async function ask(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}
