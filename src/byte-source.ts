import * as fs from 'fs';
import {DbfError} from './errors';




/**
 * A forward-only source of bytes. Decoding only ever reads sequentially from the current position; sources are never
 * asked to seek.
 */
export interface ByteSource {

    /**
     * Reads exactly `length` bytes from the current position and advances past them. Throws a DbfError of kind
     * 'IoError' if the underlying read fails or fewer than `length` bytes remain.
     */
    read(length: number): Buffer;

    /** Releases any resources held by the source. Optional; in-memory sources have nothing to release. */
    close?(): void;
}




/** A byte source reading from an in-memory buffer. */
export class BufferSource implements ByteSource {

    constructor(buffer: Buffer | Uint8Array) {
        this._buffer = Buffer.isBuffer(buffer) ? buffer : Buffer.from(buffer.buffer, buffer.byteOffset, buffer.length);
    }

    /** Number of bytes consumed so far. */
    get position() {
        return this._position;
    }

    read(length: number): Buffer {
        let end = this._position + length;
        if (end > this._buffer.length) {
            let available = this._buffer.length - this._position;
            throw new DbfError('IoError', `Unexpected end of data: needed ${length} bytes but only ${available} remain`);
        }
        let result = this._buffer.subarray(this._position, end);
        this._position = end;
        return result;
    }

    // Private.
    private _buffer: Buffer;
    private _position = 0;
}




/** A byte source reading sequentially from a file, using synchronous file system calls. */
export class FileSource implements ByteSource {

    /** Opens the file at `path` for reading. */
    constructor(path: string) {
        this.path = path;
        try {
            this._fd = fs.openSync(path, 'r');
        }
        catch (err) {
            throw new DbfError('IoError', `Unable to open file '${path}'`, {cause: err});
        }
    }

    /** Path of the file being read. */
    readonly path: string;

    read(length: number): Buffer {
        if (this._fd === undefined) throw new DbfError('IoError', `File '${this.path}' is closed`);
        let buffer = Buffer.alloc(length);
        let filled = 0;
        while (filled < length) {
            let bytesRead: number;
            try {
                bytesRead = fs.readSync(this._fd, buffer, filled, length - filled, null);
            }
            catch (err) {
                throw new DbfError('IoError', `Error reading file '${this.path}'`, {cause: err});
            }
            if (bytesRead === 0) {
                throw new DbfError('IoError', `Unexpected end of file '${this.path}': needed ${length} bytes but only ${filled} remain`);
            }
            filled += bytesRead;
        }
        return buffer;
    }

    close(): void {
        if (this._fd === undefined) return;
        let fd = this._fd;
        this._fd = undefined;
        fs.closeSync(fd);
    }

    // Private.
    private _fd?: number;
}
