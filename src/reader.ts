import {debuglog} from 'util';
import {BufferSource, type ByteSource, FileSource} from './byte-source';
import {type DecodeContext, decodeFieldValue, type FieldValue} from './field-value';
import {type FieldDescriptor, isDeletionFlag, readFieldDescriptors} from './field-descriptor';
import {type Header, readHeader} from './header';
import {normaliseReadOptions, type ReadOptions} from './options';




/** One decoded record, mapping field names to field values. The deletion flag is never included. */
export type DbfRecord = Record<string, FieldValue>;




/**
 * Reads records from a DBF file. The header and field descriptors are read when the reader is constructed. Records are
 * then decoded one at a time, in file order, by iterating over the reader.
 *
 * If decoding a record fails, the error is thrown from that iteration step, and thrown again from every later step,
 * since the reader no longer knows where the next record starts.
 */
export class Reader implements IterableIterator<DbfRecord> {

    /** Opens the DBF file at `path` and reads its header. The file stays open until `close` is called. */
    static open(path: string, options?: ReadOptions): Reader {
        let source = new FileSource(path);
        try {
            return new Reader(source, options);
        }
        catch (err) {
            source.close();
            throw err;
        }
    }

    /**
     * Creates a reader over `source`, which must be positioned at the start of a DBF file. Reads the header and the
     * field descriptors, leaving `source` positioned at the first record. The reader takes ownership of `source`.
     */
    constructor(source: ByteSource, options?: ReadOptions) {
        let {encoding, readMode} = normaliseReadOptions(options);
        this._source = source;
        this.header = readHeader(source, {encoding, readMode});
        this.descriptors = Object.freeze(readFieldDescriptors(source, this.header, {encoding, readMode}));
        this._context = {version: this.header.version, encoding, readMode};
        if (this.header.recordCount === 0) this._state = 'exhausted';
    }

    /** The file header. */
    readonly header: Header;

    /**
     * The table of field descriptors used to decode each record, in file order. The first entry is always the
     * synthetic DELETION_FLAG descriptor; the remaining entries are the fields defined in the file.
     */
    readonly descriptors: readonly FieldDescriptor[];

    /** Metadata for all fields defined in the DBF file. */
    get fields(): FieldDescriptor[] {
        return this.descriptors.filter(field => !isDeletionFlag(field));
    }

    /** Total number of records in the DBF file. (NB: includes deleted records). */
    get recordCount(): number {
        return this.header.recordCount;
    }

    /** Number of records decoded so far. */
    get recordsRead(): number {
        return this._recordsRead;
    }

    /** Decodes the next record. */
    next(): IteratorResult<DbfRecord, undefined> {
        if (this._state === 'failed') throw this._error;
        if (this._state !== 'active') return {done: true, value: undefined};
        try {
            let record: DbfRecord = {};
            for (let field of this.descriptors) {
                let value = decodeFieldValue(this._source, field, this._context);
                if (value === undefined || isDeletionFlag(field)) continue;
                record[field.name] = value;
            }
            this._recordsRead += 1;
            if (this._recordsRead >= this.header.recordCount) {
                this._state = 'exhausted';
                debug('exhausted after %d records', this._recordsRead);
            }
            return {done: false, value: record};
        }
        catch (err) {
            this._state = 'failed';
            this._error = err;
            debug('failed at record %d: %s', this._recordsRead, err);
            throw err;
        }
    }

    [Symbol.iterator](): this {
        return this;
    }

    /** Decodes up to `maxCount` further records. Returns an empty array once all records have been read. */
    readRecords(maxCount = 10000000): DbfRecord[] {
        let records: DbfRecord[] = [];
        while (records.length < maxCount) {
            let result = this.next();
            if (result.done) break;
            records.push(result.value);
        }
        return records;
    }

    /** Releases the underlying byte source. Iteration ends once the reader is closed. */
    close(): void {
        if (this._state === 'closed') return;
        this._state = 'closed';
        this._source.close?.();
    }

    // Private.
    private _source: ByteSource;
    private _context: DecodeContext;
    private _state = 'active' as 'active' | 'exhausted' | 'failed' | 'closed';
    private _error: unknown;
    private _recordsRead = 0;
}




/**
 * Reads all records from a DBF file in one call. `source` may be a path to a file, a buffer holding the file's
 * contents, or any other byte source. Files opened by this function are closed before it returns.
 */
export function read(source: string | Uint8Array | ByteSource, options?: ReadOptions): DbfRecord[] {
    if (typeof source === 'string') {
        let reader = Reader.open(source, options);
        try {
            return Array.from(reader);
        }
        finally {
            reader.close();
        }
    }
    let byteSource = source instanceof Uint8Array ? new BufferSource(source) : source;
    return Array.from(new Reader(byteSource, options));
}




const debug = debuglog('dbf');
