import {encodingExists} from 'iconv-lite';




/** Options for reading a DBF file. */
export interface ReadOptions {

    /**
     * How strictly the file's header is checked. The following values are supported, with the default being 'strict':
     * - 'strict': unsupported file versions, invalid or duplicate field descriptors, a record length that disagrees
     *   with the field sizes, and field data that does not match its declared type are all reported as errors.
     * - 'loose': skip these checks and decode what can be decoded. Fields of unsupported types are present in the
     *   field descriptors but missing from read records, and undecodable values are read as null.
     */
    readMode?: 'strict' | 'loose';

    /** The character encoding(s) to use when decoding text. Defaults to ISO-8859-1. */
    encoding?: Encoding;
}




/**
 * Character encoding. Either a string, which applies to all fields, or an object whose keys are field names and
 * whose values are encodings. If given as an object, field keys are all optional, but a 'default' key is required.
 * Valid encodings may be found here: https://github.com/ashtuchkin/iconv-lite/wiki/Supported-Encodings
 */
export type Encoding = string | {default: string, [fieldName: string]: string};




/** Validates the given ReadOptions and substitutes defaults for missing properties. Returns a new options object. */
export function normaliseReadOptions(options: ReadOptions | undefined): Required<ReadOptions> {

    // Validate `encoding`.
    let encoding = options?.encoding ?? 'ISO-8859-1';
    assertValidEncoding(encoding);

    // Validate `readMode`.
    let readMode = options?.readMode ?? 'strict';
    if (readMode !== 'strict' && readMode !== 'loose') {
        throw new Error(`Invalid read mode ${String(readMode)}`);
    }

    // Return a new normalised options object.
    return {encoding, readMode};
}




/** Returns the encoding to use for the named field, falling back to the default encoding. */
export function getEncoding(encoding: Encoding, fieldName?: string): string {
    if (typeof encoding === 'string') return encoding;
    return (fieldName !== undefined ? encoding[fieldName] : undefined) || encoding.default;
}




// Helper function for validating encodings.
function assertValidEncoding(encoding: unknown): asserts encoding is Encoding {
    if (typeof encoding === 'string') {
        if (!encodingExists(encoding)) throw new Error(`Unsupported character encoding '${encoding}'`);
    }
    else if (typeof encoding === 'object' && encoding !== null) {
        let entries = Object.entries(encoding);
        if (!entries.some(([key, value]) => key === 'default' && value)) throw new Error(`No default encoding specified`);
        for (let [key, value] of entries) {
            if (typeof value !== 'string' || !encodingExists(value)) {
                throw new Error(`Unsupported character encoding '${String(value)}' for field '${key}'`);
            }
        }
    }
    else {
        throw new Error(`Invalid encoding value ${String(encoding)}`);
    }
}
