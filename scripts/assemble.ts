import fs from 'fs';
import { assemble } from '../src/assembler/assembler.ts';
import { AssemblyError } from '../src/assembler/errors.ts';
import { formatListing } from '../src/isa/disassemble.ts';
import { parseArgs } from '../src/emulator/config.ts';

// Prints the resolved listing of a program: labels, instruction indices, operands.
function main() {
  const argv = process.argv.slice(2);
  const sourcePath = argv.find((a) => !a.startsWith('--'));
  const args = parseArgs(argv);
  if (!sourcePath) {
    console.error('Usage: npm run assemble -- <program.asm> [--registers=16]');
    process.exit(2);
  }
  const registers = args.registers ? Number(args.registers) : undefined;

  try {
    const program = assemble(fs.readFileSync(sourcePath, 'utf8'), registers);
    for (const line of formatListing(program.labels, program.instructions)) console.log(line);
    console.log(`[assemble] ${program.instructions.length} instructions, ${program.labels.size} labels`);
  } catch (e) {
    if (!(e instanceof AssemblyError)) throw e;
    console.error(`[assemble] ${e.message}`);
    process.exit(1);
  }
}

main();
