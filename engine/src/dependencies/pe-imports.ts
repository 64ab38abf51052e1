/**
 * Cellar Engine — PE Import Table Reader
 *
 * Reads the names of the libraries a Windows executable imports, from both
 * the regular import directory and the delay-load import directory.
 *
 * Only the headers and import descriptors are parsed; nothing is executed.
 * Layout follows the Microsoft PE/COFF format.
 */

const MZ_SIGNATURE = 0x5a4d;
const PE_SIGNATURE = 0x00004550;
const PE32_MAGIC = 0x10b;
const PE32_PLUS_MAGIC = 0x20b;

const IMPORT_DIRECTORY = 1;
const DELAY_IMPORT_DIRECTORY = 13;

const IMPORT_DESCRIPTOR_SIZE = 20;
const DELAY_DESCRIPTOR_SIZE = 32;
const SECTION_HEADER_SIZE = 40;

/** Upper bound on descriptors walked per directory */
const MAX_DESCRIPTORS = 4096;
const MAX_NAME_LENGTH = 256;

export class PeFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PeFormatError";
  }
}

interface Section {
  virtualAddress: number;
  virtualSize: number;
  rawSize: number;
  rawPointer: number;
}

interface DataDirectory {
  rva: number;
  size: number;
}

function readU16(buf: Buffer, offset: number): number {
  if (offset < 0 || offset + 2 > buf.length) {
    throw new PeFormatError(`Truncated image: cannot read 2 bytes at 0x${offset.toString(16)}`);
  }
  return buf.readUInt16LE(offset);
}

function readU32(buf: Buffer, offset: number): number {
  if (offset < 0 || offset + 4 > buf.length) {
    throw new PeFormatError(`Truncated image: cannot read 4 bytes at 0x${offset.toString(16)}`);
  }
  return buf.readUInt32LE(offset);
}

function rvaToOffset(rva: number, sections: Section[]): number | undefined {
  for (const section of sections) {
    const span = Math.max(section.virtualSize, section.rawSize);
    if (rva >= section.virtualAddress && rva < section.virtualAddress + span) {
      return rva - section.virtualAddress + section.rawPointer;
    }
  }
  return undefined;
}

function readCString(buf: Buffer, offset: number): string {
  const end = Math.min(buf.length, offset + MAX_NAME_LENGTH);
  let cursor = offset;
  while (cursor < end && buf[cursor] !== 0) cursor++;
  return buf.toString("latin1", offset, cursor);
}

function readDirectory(
  buf: Buffer,
  sections: Section[],
  directory: DataDirectory | undefined,
  descriptorSize: number,
  nameField: number,
): string[] {
  if (!directory || directory.rva === 0) return [];

  const start = rvaToOffset(directory.rva, sections);
  if (start === undefined) return [];

  const names: string[] = [];
  for (let i = 0; i < MAX_DESCRIPTORS; i++) {
    const descriptor = start + i * descriptorSize;
    if (descriptor + descriptorSize > buf.length) break;

    const nameRva = readU32(buf, descriptor + nameField);
    if (nameRva === 0) break;

    const nameOffset = rvaToOffset(nameRva, sections);
    if (nameOffset === undefined) continue;

    const name = readCString(buf, nameOffset);
    if (name.length > 0) names.push(name);
  }
  return names;
}

/**
 * List the libraries a PE image imports, in descriptor order: regular
 * imports first, then delay-loaded ones. Duplicates are kept.
 *
 * @throws PeFormatError when the buffer is not a PE image
 */
export function readPeImports(buf: Buffer): string[] {
  if (buf.length < 0x40 || readU16(buf, 0) !== MZ_SIGNATURE) {
    throw new PeFormatError("Not a PE image: missing MZ header");
  }

  const peOffset = readU32(buf, 0x3c);
  if (readU32(buf, peOffset) !== PE_SIGNATURE) {
    throw new PeFormatError("Not a PE image: missing PE signature");
  }

  const coff = peOffset + 4;
  const sectionCount = readU16(buf, coff + 2);
  const optionalHeaderSize = readU16(buf, coff + 16);
  const optional = coff + 20;

  const magic = readU16(buf, optional);
  let directoryCountOffset: number;
  if (magic === PE32_MAGIC) {
    directoryCountOffset = optional + 92;
  } else if (magic === PE32_PLUS_MAGIC) {
    directoryCountOffset = optional + 108;
  } else {
    throw new PeFormatError(`Unknown optional header magic 0x${magic.toString(16)}`);
  }

  const directoryCount = readU32(buf, directoryCountOffset);
  const directories: DataDirectory[] = [];
  for (let i = 0; i < Math.min(directoryCount, 16); i++) {
    const entry = directoryCountOffset + 4 + i * 8;
    directories.push({ rva: readU32(buf, entry), size: readU32(buf, entry + 4) });
  }

  const sectionTable = optional + optionalHeaderSize;
  const sections: Section[] = [];
  for (let i = 0; i < sectionCount; i++) {
    const header = sectionTable + i * SECTION_HEADER_SIZE;
    sections.push({
      virtualSize: readU32(buf, header + 8),
      virtualAddress: readU32(buf, header + 12),
      rawSize: readU32(buf, header + 16),
      rawPointer: readU32(buf, header + 20),
    });
  }

  return [
    ...readDirectory(buf, sections, directories[IMPORT_DIRECTORY], IMPORT_DESCRIPTOR_SIZE, 12),
    ...readDirectory(buf, sections, directories[DELAY_IMPORT_DIRECTORY], DELAY_DESCRIPTOR_SIZE, 4),
  ];
}
