/**
 * ucitap2json - tap log to JSON converter
 */

import { createConvertProgram } from '../cli.js';
import { handleError } from '../errors/index.js';

/**
 * Main entry point
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createConvertProgram().parseAsync(argv);
  } catch (error) {
    handleError(error);
  }
}

main().catch(handleError);
