/**
 * Builds minimal PE32 images with a given import table, for resolver tests.
 *
 * Layout: DOS header, PE header at 0x40, one section mapped at RVA 0x1000
 * from file offset 0x200 holding the import descriptors and the names.
 */

const PE_OFFSET = 0x40;
const OPTIONAL_OFFSET = PE_OFFSET + 4 + 20;
const OPTIONAL_SIZE = 0xe0;
const DIRECTORIES_OFFSET = OPTIONAL_OFFSET + 96;
const SECTION_TABLE = OPTIONAL_OFFSET + OPTIONAL_SIZE;
const SECTION_RAW = 0x200;
const SECTION_RVA = 0x1000;

export function buildPe(imports: string[], delayImports: string[] = []): Buffer {
  const importTableSize = imports.length > 0 ? (imports.length + 1) * 20 : 0;
  const delayTableSize = delayImports.length > 0 ? (delayImports.length + 1) * 32 : 0;
  const namesStart = importTableSize + delayTableSize;
  const namesSize = [...imports, ...delayImports].reduce((n, s) => n + s.length + 1, 0);
  const sectionSize = Math.ceil((namesStart + namesSize + 1) / 0x200) * 0x200;

  const buf = Buffer.alloc(SECTION_RAW + sectionSize);

  // DOS header
  buf.writeUInt16LE(0x5a4d, 0);
  buf.writeUInt32LE(PE_OFFSET, 0x3c);

  // PE signature + COFF header
  buf.writeUInt32LE(0x00004550, PE_OFFSET);
  buf.writeUInt16LE(0x14c, PE_OFFSET + 4);
  buf.writeUInt16LE(1, PE_OFFSET + 6);
  buf.writeUInt16LE(OPTIONAL_SIZE, PE_OFFSET + 20);

  // Optional header (PE32)
  buf.writeUInt16LE(0x10b, OPTIONAL_OFFSET);
  buf.writeUInt32LE(16, OPTIONAL_OFFSET + 92);
  if (importTableSize > 0) {
    buf.writeUInt32LE(SECTION_RVA, DIRECTORIES_OFFSET + 1 * 8);
    buf.writeUInt32LE(importTableSize, DIRECTORIES_OFFSET + 1 * 8 + 4);
  }
  if (delayTableSize > 0) {
    buf.writeUInt32LE(SECTION_RVA + importTableSize, DIRECTORIES_OFFSET + 13 * 8);
    buf.writeUInt32LE(delayTableSize, DIRECTORIES_OFFSET + 13 * 8 + 4);
  }

  // Section header
  buf.write(".idata", SECTION_TABLE, "latin1");
  buf.writeUInt32LE(sectionSize, SECTION_TABLE + 8);
  buf.writeUInt32LE(SECTION_RVA, SECTION_TABLE + 12);
  buf.writeUInt32LE(sectionSize, SECTION_TABLE + 16);
  buf.writeUInt32LE(SECTION_RAW, SECTION_TABLE + 20);

  let nameCursor = namesStart;
  const writeName = (name: string): number => {
    const rva = SECTION_RVA + nameCursor;
    buf.write(name, SECTION_RAW + nameCursor, "latin1");
    nameCursor += name.length + 1;
    return rva;
  };

  imports.forEach((name, i) => {
    buf.writeUInt32LE(writeName(name), SECTION_RAW + i * 20 + 12);
  });
  delayImports.forEach((name, i) => {
    buf.writeUInt32LE(writeName(name), SECTION_RAW + importTableSize + i * 32 + 4);
  });

  return buf;
}
