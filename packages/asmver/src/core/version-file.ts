import { readFile, writeFile } from 'fs/promises'
import { fileLogger } from '../utils/logger.js'
import { AsmVerError, type FileEncoding, type FileRecord } from './types.js'

const BYTE_ORDER_MARKS: Array<{ encoding: FileEncoding; bytes: Buffer }> = [
  { encoding: 'utf8', bytes: Buffer.from([0xef, 0xbb, 0xbf]) },
  { encoding: 'utf16le', bytes: Buffer.from([0xff, 0xfe]) },
]

/**
 * Decode file bytes into a {@link FileRecord}
 *
 * A UTF-8 or UTF-16 LE byte-order mark selects the encoding; without one the
 * content is read as UTF-8. Content that does not survive a decode/encode
 * round trip in that encoding is decoded as latin1 instead, which maps every
 * byte to exactly one character and back.
 */
export function decodeFileRecord(path: string, raw: Buffer): FileRecord {
  const mark = BYTE_ORDER_MARKS.find(candidate => raw.subarray(0, candidate.bytes.length).equals(candidate.bytes))
  const bom = mark ? raw.subarray(0, mark.bytes.length) : null
  const body = bom ? raw.subarray(bom.length) : raw

  let encoding: FileEncoding = mark?.encoding ?? 'utf8'
  let text = body.toString(encoding)
  if (!Buffer.from(text, encoding).equals(body)) {
    fileLogger.debug(`${path} is not valid ${encoding}, reading it byte for byte`)
    encoding = 'latin1'
    text = body.toString(encoding)
  }

  return { path, text, encoding, bom, raw }
}

/**
 * Encode text for a record, restoring its byte-order mark
 */
export function encodeFileRecord(record: FileRecord, text: string): Buffer {
  const body = Buffer.from(text, record.encoding)
  return record.bom ? Buffer.concat([record.bom, body]) : body
}

/**
 * Read a version file from disk
 *
 * @throws {AsmVerError} READ_ERROR when the file cannot be read
 */
export async function readFileRecord(path: string): Promise<FileRecord> {
  try {
    return decodeFileRecord(path, await readFile(path))
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new AsmVerError(`Failed to read file: ${message}`, 'READ_ERROR', path, { cause: error })
  }
}

/**
 * Write new text back to a record's file, in the encoding it was read with
 *
 * Nothing is written when the encoded bytes equal the bytes read, so an
 * unchanged file keeps its modification time.
 *
 * @returns Whether the file was written
 * @throws {AsmVerError} WRITE_ERROR when the file cannot be written
 */
export async function writeFileRecord(record: FileRecord, text: string): Promise<boolean> {
  const bytes = encodeFileRecord(record, text)
  if (bytes.equals(record.raw)) {
    return false
  }

  try {
    await writeFile(record.path, bytes)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new AsmVerError(`Failed to write file: ${message}`, 'WRITE_ERROR', record.path, { cause: error })
  }

  fileLogger.debug(`Wrote ${bytes.length} bytes to ${record.path}`)
  return true
}
