import * as iconv from 'iconv-lite';
import {debuglog} from 'util';
import type {ByteSource} from './byte-source';
import {DbfError} from './errors';
import {DESCRIPTOR_SIZE, type Header, HEADER_SIZE, HEADER_TERMINATOR} from './header';
import {getEncoding, type ReadOptions} from './options';




/** The single-letter codes of the field types this library can decode. */
export type FieldType = 'C' | 'N' | 'F' | 'L' | 'D' | 'I' | 'M' | 'T' | 'B';




/** Metadata describing a single field in a DBF file. */
export interface FieldDescriptor {

    /** The name of the field. No longer than 10 characters. */
    name: string;

    /**
     * The single-letter code for the field type.
     * C=string, N=numeric, F=float, L=logical, D=date, I=integer, M=memo, T=datetime, B=double.
     * Other codes only appear when reading in 'loose' mode.
     */
    type: FieldType | (string & {});

    /** The size of the field in bytes. */
    size: number;

    /** The number of decimal places. Only meaningful for some field types. */
    decimalPlaces: number;
}




/** Name of the synthetic descriptor for the one-byte deletion flag that starts every record. */
export const DELETION_FLAG_NAME = 'DeletionFlag';




/**
 * The synthetic descriptor for the deletion flag. It leads the descriptor table used to assemble records, so that the
 * table accounts for every byte of a record, but its value never appears in a record.
 */
export const DELETION_FLAG: Readonly<FieldDescriptor> = Object.freeze({
    name: DELETION_FLAG_NAME,
    type: 'C',
    size: 1,
    decimalPlaces: 0,
});




export function isDeletionFlag(field: FieldDescriptor): boolean {
    return field === DELETION_FLAG;
}




export function isSupportedFieldType(type: string): type is FieldType {
    return FieldTypes.some(t => t === type);
}




/**
 * Reads the field descriptors and the terminator that follow the header. Returns the descriptor table, whose first
 * entry is the synthetic DELETION_FLAG descriptor. Leaves `source` positioned at the first byte of the first record.
 */
export function readFieldDescriptors(source: ByteSource, header: Header, options: Required<ReadOptions>): FieldDescriptor[] {
    let numFields = Math.floor((header.headerLength - HEADER_SIZE) / DESCRIPTOR_SIZE);
    let fields: FieldDescriptor[] = [DELETION_FLAG];
    let bytesRead = HEADER_SIZE;
    let foundTerminator = false;

    // Parse and validate all field descriptors. Skip validation if reading in 'loose' mode.
    for (let i = 0; i < numFields; ++i) {
        let buffer = source.read(DESCRIPTOR_SIZE);
        bytesRead += DESCRIPTOR_SIZE;

        // Visual FoxPro files have a backlink area after the terminator, so the terminator may come early.
        if (buffer[0] === HEADER_TERMINATOR) {
            foundTerminator = true;
            break;
        }
        let field = decodeFieldDescriptor(buffer, options);
        if (options.readMode !== 'loose') {
            validateFieldDescriptor(header.version, field);
            if (fields.some(f => f.name === field.name)) {
                throw new DbfError('MalformedFieldDescriptor', `Duplicate field name: '${field.name}'`, {field: field.name});
            }
        }
        fields.push(field);
    }

    // Parse the header terminator.
    if (!foundTerminator) {
        let terminator = source.read(1)[0];
        bytesRead += 1;
        if (terminator !== HEADER_TERMINATOR) {
            throw new DbfError('UnexpectedTerminator', `Invalid DBF: expected header terminator 0x0D but found 0x${hex(terminator)}`);
        }
    }

    // Skip any padding between the terminator and the first record.
    if (header.headerLength > bytesRead) source.read(header.headerLength - bytesRead);

    // Validate the record length. Skip validation if reading in 'loose' mode.
    let computedRecordLength = fields.reduce((len, f) => len + f.size, 0);
    if (options.readMode !== 'loose' && header.recordLength !== computedRecordLength) {
        throw new DbfError('MalformedHeader', `Invalid DBF: record length is ${header.recordLength} but the fields require ${computedRecordLength}`);
    }
    debug('fields: %s', fields.map(f => `${f.name}:${f.type}(${f.size})`).join(' '));
    return fields;
}




/** Checks a field descriptor read from a file with the given version. Throws a DbfError if it is invalid. */
export function validateFieldDescriptor(version: number, field: FieldDescriptor): void {
    let {name, type, size, decimalPlaces: decs} = field;
    let fail = (message: string) => {
        throw new DbfError('MalformedFieldDescriptor', `${name || '(unnamed)'}: ${message}`, {field: name});
    };

    // name
    if (name.length < 1) fail(`Field name is too short (minimum is 1 char)`);
    if (name.length > 10) fail(`Field name '${name}' is too long (maximum is 10 chars)`);

    // type
    if (!isSupportedFieldType(type)) fail(`Type '${type}' is not supported`);

    // size
    if (size < 1) fail('Field size is too small (minimum is 1)');
    if (type === 'C' && size > 255) fail('Field size is too large (maximum is 255)');
    if (type === 'N' && size > 20) fail('Field size is too large (maximum is 20)');
    if (type === 'F' && size > 20) fail('Field size is too large (maximum is 20)');
    if (type === 'L' && size !== 1) fail('Invalid field size (must be 1)');
    if (type === 'D' && size !== 8) fail('Invalid field size (must be 8)');
    if (type === 'M' && size !== 10 && size !== 4) fail('Invalid field size (must be 10 or 4)');
    if (type === 'T' && size !== 8) fail('Invalid field size (must be 8)');
    if (type === 'B' && size !== 8) fail('Invalid field size (must be 8)');
    if (type === 'I' && size !== 4) fail('Invalid field size (must be 4)');

    // decimalPlaces
    let maxDecimals = version === 0x8b ? 18 : 15;
    if (decs > maxDecimals) fail(`Decimal count is too large (maximum is ${maxDecimals})`);
}




// Decodes one 32-byte field descriptor. Only the name, type, size and decimal count are used; the rest is reserved.
function decodeFieldDescriptor(buffer: Buffer, options: Required<ReadOptions>): FieldDescriptor {
    return Object.freeze({
        name: iconv.decode(buffer.subarray(0, 11), getEncoding(options.encoding)).split('\0')[0],
        type: String.fromCharCode(buffer[0x0B]),
        size: buffer.readUInt8(0x10),
        decimalPlaces: buffer.readUInt8(0x11),
    });
}




function hex(byte: number) {
    return byte.toString(16).toUpperCase().padStart(2, '0');
}




const FieldTypes: FieldType[] = ['C', 'N', 'F', 'L', 'D', 'I', 'M', 'T', 'B'];
const debug = debuglog('dbf');
