import * as iconv from 'iconv-lite';
import type {ByteSource} from './byte-source';
import {DbfError} from './errors';
import type {FieldDescriptor} from './field-descriptor';
import {type Encoding, getEncoding} from './options';
import {parse8CharDate, parseVfpDateTime} from './utils';




/**
 * A decoded field value. The JavaScript type depends on the field type:
 * - C (character): string, with trailing spaces removed.
 * - N (numeric), F (float): number, or null if blank.
 * - L (logical): boolean, or null if uninitialised.
 * - D (date), T (datetime): Date, or null if blank.
 * - I (integer), B (double): number.
 * - M (memo): the number of the memo block holding the value, or null if there is no memo. The memo file itself is
 *   not read.
 */
export type FieldValue = string | number | boolean | Date | null;




/** What the field value decoder needs to know about the file being read. */
export interface DecodeContext {
    version: number;
    encoding: Encoding;
    readMode: 'strict' | 'loose';
}




/**
 * Reads exactly `field.size` bytes from `source` and decodes them according to the field's type. Returns undefined for
 * fields of unsupported types in 'loose' read mode, whose bytes are skipped. Throws a DbfError of kind
 * 'InvalidFieldData' if the bytes cannot be decoded in 'strict' read mode.
 */
export function decodeFieldValue(source: ByteSource, field: FieldDescriptor, context: DecodeContext): FieldValue | undefined {
    let buffer = source.read(field.size);
    let encoding = getEncoding(context.encoding, field.name);
    let invalid = (message: string) => {
        if (context.readMode === 'loose') return null;
        throw new DbfError('InvalidFieldData', `${field.name}: ${message}`, {field: field.name});
    };

    // Decode the field from the buffer, according to its type.
    switch (field.type) {
        case 'C': { // Text
            let len = buffer.length;
            while (len > 0 && buffer[len - 1] === 0x20) --len;
            return iconv.decode(buffer.subarray(0, len), encoding);
        }

        case 'N': // Number
        case 'F': { // Float - appears to be treated identically to Number
            let text = iconv.decode(buffer, encoding).trim();
            if (text === '') return null;
            return DecimalNumber.test(text) ? parseFloat(text) : invalid(`'${text}' is not a number`);
        }

        case 'L': { // Boolean
            let c = String.fromCharCode(buffer[0]);
            if ('TtYy'.includes(c)) return true;
            if ('FfNn'.includes(c)) return false;
            if (c === '?' || c === ' ') return null;
            return invalid(`'${c}' is not a logical value`);
        }

        case 'D': { // Date
            if (isBlank(buffer)) return null;
            let text = iconv.decode(buffer, encoding);
            return parse8CharDate(text) ?? invalid(`'${text}' is not a date`);
        }

        case 'T': { // DateTime
            if (buffer.length < 8) return invalid(`field size ${buffer.length} is too small for a date-time`);
            if (isBlank(buffer)) return null;
            const julianDay = buffer.readInt32LE(0);
            const msSinceMidnight = buffer.readInt32LE(4) + 1;
            return parseVfpDateTime({julianDay, msSinceMidnight});
        }

        case 'B': // Double
            return buffer.length < 8 ? invalid(`field size ${buffer.length} is too small for a double`) : buffer.readDoubleLE(0);

        case 'I': // Integer
            return buffer.length < 4 ? invalid(`field size ${buffer.length} is too small for an integer`) : buffer.readInt32LE(0);

        case 'M': { // Memo
            if (isBlank(buffer)) return null;

            // Visual FoxPro stores the block number as a 4-byte integer, dBase as ASCII digits.
            let blockIndex: number;
            if (context.version === 0x30 && buffer.length === 4) {
                blockIndex = buffer.readInt32LE(0);
            }
            else {
                let text = iconv.decode(buffer, encoding).trim();
                blockIndex = /^\d+$/.test(text) ? Number(text) : NaN;
                if (isNaN(blockIndex)) return invalid(`'${text}' is not a memo block number`);
            }
            return blockIndex === 0 ? null : blockIndex;
        }

        default:
            // Skip over the field data if reading in 'loose' mode.
            if (context.readMode === 'loose') return undefined;
            throw new DbfError('InvalidFieldData', `Type '${field.type}' is not supported`, {field: field.name});
    }
}




const DecimalNumber = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;




// Blank values are filled with spaces, or sometimes with zero bytes.
function isBlank(buffer: Buffer) {
    return buffer.every(b => b === 0x20 || b === 0x00);
}
