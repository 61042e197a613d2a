/**
 * Minimal PE import-table reader.
 *
 * Walks DOS header -> NT headers -> section table -> import directory and
 * returns the names of functions imported by name. Ordinal-only imports
 * carry no name and are skipped. Delay-load imports are not read.
 */

import { ParseError } from "../errors/pescan-error.js";

const MZ_SIGNATURE = 0x5a4d;
const PE_SIGNATURE = 0x00004550;
const PE32_MAGIC = 0x10b;
const PE32_PLUS_MAGIC = 0x20b;
const IMPORT_DIRECTORY_INDEX = 1;
const DESCRIPTOR_SIZE = 20;
const SECTION_HEADER_SIZE = 40;
const MAX_NAME_LENGTH = 512;

interface Section {
  virtualAddress: number;
  virtualSize: number;
  sizeOfRawData: number;
  pointerToRawData: number;
}

export interface ImportedFunction {
  dll: string;
  name: string;
}

function notPe(reason: string): ParseError {
  return new ParseError(
    `Not a valid PE file: ${reason}`,
    "NOT_PE",
    "Only Windows PE executables and DLLs are supported",
  );
}

function rvaToOffset(rva: number, sections: Section[]): number {
  for (const section of sections) {
    const effectiveSize = Math.max(section.virtualSize, section.sizeOfRawData);
    if (rva >= section.virtualAddress && rva < section.virtualAddress + effectiveSize) {
      return section.pointerToRawData + (rva - section.virtualAddress);
    }
  }
  return -1;
}

function readCString(image: Buffer, offset: number): string {
  const end = image.indexOf(0, offset);
  const stop = end === -1 ? Math.min(image.length, offset + MAX_NAME_LENGTH) : end;
  return image.subarray(offset, stop).toString("latin1");
}

/** Every function imported by name, with the DLL it is imported from. */
export function readImports(image: Buffer): ImportedFunction[] {
  try {
    return walkImports(image);
  } catch (err) {
    if (err instanceof RangeError) {
      throw notPe("truncated headers or import table");
    }
    throw err;
  }
}

/** Names of the functions a PE image imports, in table order. */
export function readImportNames(image: Buffer): string[] {
  return readImports(image).map((imp) => imp.name);
}

function walkImports(image: Buffer): ImportedFunction[] {
  if (image.length < 0x40 || image.readUInt16LE(0) !== MZ_SIGNATURE) {
    throw notPe("missing MZ header");
  }

  const peOffset = image.readUInt32LE(0x3c);
  if (image.readUInt32LE(peOffset) !== PE_SIGNATURE) {
    throw notPe("missing PE signature");
  }

  const coffOffset = peOffset + 4;
  const numberOfSections = image.readUInt16LE(coffOffset + 2);
  const sizeOfOptionalHeader = image.readUInt16LE(coffOffset + 16);
  const optOffset = coffOffset + 20;

  const magic = image.readUInt16LE(optOffset);
  let isPE32Plus: boolean;
  if (magic === PE32_MAGIC) {
    isPE32Plus = false;
  } else if (magic === PE32_PLUS_MAGIC) {
    isPE32Plus = true;
  } else {
    throw notPe(`unknown optional header magic 0x${magic.toString(16)}`);
  }

  const rvaCountOffset = optOffset + (isPE32Plus ? 108 : 92);
  const dataDirOffset = rvaCountOffset + 4;
  const numberOfRvaAndSizes = image.readUInt32LE(rvaCountOffset);

  const sections: Section[] = [];
  const sectionTableOffset = optOffset + sizeOfOptionalHeader;
  for (let i = 0; i < numberOfSections; i++) {
    const offset = sectionTableOffset + i * SECTION_HEADER_SIZE;
    sections.push({
      virtualSize: image.readUInt32LE(offset + 8),
      virtualAddress: image.readUInt32LE(offset + 12),
      sizeOfRawData: image.readUInt32LE(offset + 16),
      pointerToRawData: image.readUInt32LE(offset + 20),
    });
  }

  if (numberOfRvaAndSizes <= IMPORT_DIRECTORY_INDEX) {
    return [];
  }
  const importRva = image.readUInt32LE(dataDirOffset + IMPORT_DIRECTORY_INDEX * 8);
  if (importRva === 0) {
    return [];
  }

  const importOffset = rvaToOffset(importRva, sections);
  if (importOffset === -1) {
    throw notPe("import directory lies outside every section");
  }

  const imports: ImportedFunction[] = [];
  for (let offset = importOffset; ; offset += DESCRIPTOR_SIZE) {
    const originalFirstThunk = image.readUInt32LE(offset);
    const nameRva = image.readUInt32LE(offset + 12);
    const firstThunk = image.readUInt32LE(offset + 16);

    // All-zero entry terminates the list
    if (originalFirstThunk === 0 && nameRva === 0 && firstThunk === 0) break;

    const nameOffset = rvaToOffset(nameRva, sections);
    const dll = nameOffset === -1 ? "<unknown>" : readCString(image, nameOffset);

    // Prefer the lookup table; bound images may have overwritten the IAT
    const thunkRva = originalFirstThunk !== 0 ? originalFirstThunk : firstThunk;
    for (const name of walkThunks(image, sections, thunkRva, isPE32Plus)) {
      imports.push({ dll, name });
    }
  }

  return imports;
}

function walkThunks(image: Buffer, sections: Section[], thunkRva: number, isPE32Plus: boolean): string[] {
  const names: string[] = [];
  const thunkOffset = rvaToOffset(thunkRva, sections);
  if (thunkOffset === -1) return names;

  const thunkSize = isPE32Plus ? 8 : 4;
  for (let offset = thunkOffset; ; offset += thunkSize) {
    let hintNameRva: number;
    if (isPE32Plus) {
      const thunk = image.readBigUInt64LE(offset);
      if (thunk === 0n) break;
      if (thunk & 0x8000000000000000n) continue;
      hintNameRva = Number(thunk & 0x7fffffffn);
    } else {
      const thunk = image.readUInt32LE(offset);
      if (thunk === 0) break;
      if (thunk & 0x80000000) continue;
      hintNameRva = thunk;
    }

    const hintNameOffset = rvaToOffset(hintNameRva, sections);
    if (hintNameOffset === -1) continue;
    // 2-byte hint precedes the name
    const name = readCString(image, hintNameOffset + 2);
    if (name) names.push(name);
  }
  return names;
}
