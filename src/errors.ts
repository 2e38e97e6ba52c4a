/**
 * The kinds of failure that can occur while decoding a DBF file.
 * - 'IoError': the byte source failed or returned fewer bytes than requested.
 * - 'MalformedHeader': the fixed-size file header is inconsistent.
 * - 'MalformedFieldDescriptor': a field descriptor in the header is invalid.
 * - 'InvalidFieldData': the bytes of a field do not decode to the field's declared type.
 * - 'UnexpectedTerminator': the byte following the field descriptors is not 0x0D.
 */
export type DbfErrorKind =
    | 'IoError'
    | 'MalformedHeader'
    | 'MalformedFieldDescriptor'
    | 'InvalidFieldData'
    | 'UnexpectedTerminator'
;




/** Error thrown for all decoding failures. Use the `kind` property to tell failures apart. */
export class DbfError extends Error {

    constructor(kind: DbfErrorKind, message: string, options?: {field?: string, cause?: unknown}) {
        super(message);
        this.name = 'DbfError';
        this.kind = kind;
        this.field = options?.field;
        this.cause = options?.cause;
    }

    /** The kind of failure. */
    readonly kind: DbfErrorKind;

    /** Name of the field being decoded when the failure occurred, if any. */
    readonly field?: string;

    /** The underlying error, if any (eg the error raised by the file system). */
    readonly cause?: unknown;
}




/** Returns true if `err` is a DbfError, optionally of the given kind. */
export function isDbfError(err: unknown, kind?: DbfErrorKind): err is DbfError {
    if (!(err instanceof DbfError)) return false;
    return kind === undefined || err.kind === kind;
}
