export {BufferSource, type ByteSource, FileSource} from './byte-source';
export {DbfError, type DbfErrorKind, isDbfError} from './errors';
export {DELETION_FLAG, DELETION_FLAG_NAME, type FieldDescriptor, type FieldType, isSupportedFieldType} from './field-descriptor';
export {type DecodeContext, decodeFieldValue, type FieldValue} from './field-value';
export {DESCRIPTOR_SIZE, type FileVersion, type Header, HEADER_SIZE, HEADER_TERMINATOR} from './header';
export type {Encoding, ReadOptions} from './options';
export {type DbfRecord, read, Reader} from './reader';
