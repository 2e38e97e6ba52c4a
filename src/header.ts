import {debuglog} from 'util';
import type {ByteSource} from './byte-source';
import {DbfError} from './errors';
import type {ReadOptions} from './options';
import {createDate} from './utils';




/** Size in bytes of the fixed part of the header, which precedes the field descriptors. */
export const HEADER_SIZE = 32;

/** Size in bytes of each field descriptor in the header. */
export const DESCRIPTOR_SIZE = 32;

/** The byte that terminates the field descriptors. */
export const HEADER_TERMINATOR = 0x0d;




export type FileVersion =
    | 0x03 // dBase III without memo file
    | 0x83 // dBase III with memo file
    | 0x8b // dBase IV with memo file
    | 0x30 // Visual FoxPro 9 (may have memo file)
;




export function isValidFileVersion(fileVersion: number): fileVersion is FileVersion {
    return [0x03, 0x83, 0x8b, 0x30].includes(fileVersion);
}




/** The fixed-size header at the start of a DBF file. */
export interface Header {

    /** The file version byte. Only the values in FileVersion are accepted in 'strict' read mode. */
    readonly version: number;

    /** Date of last update as recorded in the header. */
    readonly dateOfLastUpdate: Date;

    /** Total number of records in the file. (NB: includes deleted records). */
    readonly recordCount: number;

    /** Length of the whole header (fixed part, field descriptors, terminator and any padding) in bytes. */
    readonly headerLength: number;

    /** Length of each record in bytes, including the one-byte deletion flag. */
    readonly recordLength: number;
}




/**
 * Reads the fixed-size header from the current position of `source`, leaving the source positioned at the first field
 * descriptor.
 */
export function readHeader(source: ByteSource, options: Required<ReadOptions>): Header {
    let buffer = source.read(HEADER_SIZE);
    let version = buffer.readUInt8(0x00);
    let lastUpdateY = buffer.readUInt8(0x01); // number of years after 1900
    let lastUpdateM = buffer.readUInt8(0x02); // 1-based
    let lastUpdateD = buffer.readUInt8(0x03); // 1-based
    let recordCount = buffer.readUInt32LE(0x04);
    let headerLength = buffer.readUInt16LE(0x08);
    let recordLength = buffer.readUInt16LE(0x0A);

    // The header must have room for the terminator after a whole number of field descriptors.
    if (headerLength < HEADER_SIZE + 1) {
        throw new DbfError('MalformedHeader', `Invalid DBF: header length ${headerLength} is smaller than ${HEADER_SIZE + 1}`);
    }
    if ((headerLength - HEADER_SIZE) % DESCRIPTOR_SIZE === 0) {
        throw new DbfError('MalformedHeader', `Invalid DBF: header length ${headerLength} leaves no room for the terminator`);
    }

    // Validate the file version and record length. Skip validation if reading in 'loose' mode.
    if (options.readMode !== 'loose') {
        if (!isValidFileVersion(version)) {
            throw new DbfError('MalformedHeader', `Unknown/unsupported dBase version: ${version}`);
        }
        if (recordLength < 1) {
            throw new DbfError('MalformedHeader', `Invalid DBF: record length ${recordLength} is too small`);
        }
    }

    let header: Header = Object.freeze({
        version,
        dateOfLastUpdate: createDate(lastUpdateY + 1900, lastUpdateM, lastUpdateD),
        recordCount,
        headerLength,
        recordLength,
    });
    debug('header: version=%d records=%d headerLength=%d recordLength=%d', version, recordCount, headerLength, recordLength);
    return header;
}




const debug = debuglog('dbf');
