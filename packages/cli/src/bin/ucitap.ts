/**
 * ucitap - transparent UCI tap
 *
 * Sits between a chess GUI and a UCI engine, relaying both directions
 * unchanged and logging every line with its direction and a timestamp.
 */

import { createTapProgram } from '../cli.js';
import { handleError } from '../errors/index.js';

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createTapProgram().parseAsync(argv);
  } catch (error) {
    handleError(error);
  }
}

main().catch(handleError);
