import { loadProgramFile } from '../src/rom/loader';
import { disassembleProgram } from '../src/cpu/disasm';
import { parseArgs } from '../src/host/config';

const args = parseArgs(process.argv);
const romPath = args.rom ?? process.env.CHIP8_ROM;
if (!romPath) {
  console.error('Usage: npm run disasm -- --rom=path/to/program.ch8');
  process.exit(1);
}

const hex = (v: number, w: number) => v.toString(16).toUpperCase().padStart(w, '0');
for (const line of disassembleProgram(loadProgramFile(romPath))) {
  const raw = line.text.startsWith('DB ') ? hex(line.opcode, 2).padEnd(4) : hex(line.opcode, 4);
  console.log(`${hex(line.address, 3)}  ${raw}  ${line.text}`);
}
