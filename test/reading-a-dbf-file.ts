import {expect} from 'chai';
import {BufferSource, DbfErrorKind, DbfRecord, isDbfError, ReadOptions, Reader} from '../src';
import {buildDbf, TestField, TestHeader} from './helpers/build-dbf';




describe('Reading a DBF file', () => {

    interface Test {

        /** Test description. */
        description: string;

        /** The field descriptors to write into the file. */
        fields: TestField[];

        /** The raw records to write into the file, each starting with its deletion flag. */
        records: Array<string | Buffer>;

        /** Overrides for the header bytes. */
        header?: TestHeader;

        /** The options to use when reading the file. */
        options?: ReadOptions;

        /** The expected records. Leave undefined if `error` is defined. */
        expectedRecords?: DbfRecord[];

        /** Expected error kind and message fragment, if any, when attempting to read the file. */
        error?: {kind: DbfErrorKind, message: string};
    }

    const people: TestField[] = [
        {name: 'NAME', type: 'C', size: 10},
        {name: 'AGE', type: 'N', size: 3},
        {name: 'PRICE', type: 'N', size: 8, decimalPlaces: 2},
        {name: 'ACTIVE', type: 'L', size: 1},
        {name: 'JOINED', type: 'D', size: 8},
    ];
    const peopleRecords = [
        ' ' + 'Alice     ' + ' 42' + '   12.50' + 'T' + '20240131',
        '*' + 'Bob       ' + '   ' + '    0.75' + '?' + '        ',
    ];

    let tests: Test[] = [
        {
            description: 'DBF with character, numeric, logical and date fields',
            fields: people,
            records: peopleRecords,
            expectedRecords: [
                {NAME: 'Alice', AGE: 42, PRICE: 12.5, ACTIVE: true, JOINED: new Date('2024-01-31')},
                {NAME: 'Bob', AGE: null, PRICE: 0.75, ACTIVE: null, JOINED: null},
            ],
        },
        {
            description: 'DBF with a single character field',
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            expectedRecords: [{NAME: 'HELLO'}],
        },
        {
            description: 'DBF with no records',
            fields: people,
            records: [],
            expectedRecords: [],
        },
        {
            description: 'DBF with padding after the header terminator (version 0x8b)',
            fields: [{name: 'CODE', type: 'C', size: 4}, {name: 'NOTES', type: 'M', size: 10}],
            records: [' AB01' + '         3', ' AB02' + '          '],
            header: {version: 0x8b, padding: 1},
            expectedRecords: [{CODE: 'AB01', NOTES: 3}, {CODE: 'AB02', NOTES: null}],
        },
        {
            description: 'Visual FoxPro DBF with a backlink area after the terminator (version 0x30)',
            fields: [{name: 'ID', type: 'I', size: 4}, {name: 'WHEN', type: 'T', size: 8}, {name: 'NOTES', type: 'M', size: 4}],
            records: [vfpRecord(7, 2456639, 30600000, 12), vfpRecord(-3, 0, 0, 0)],
            header: {version: 0x30, padding: 263},
            expectedRecords: [
                {ID: 7, WHEN: new Date('2013-12-12T08:30:00Z'), NOTES: 12},
                {ID: -3, WHEN: null, NOTES: null},
            ],
        },
        {
            description: 'DBF with a corrupted header terminator',
            fields: people,
            records: peopleRecords,
            header: {terminator: 0x20},
            error: {kind: 'UnexpectedTerminator', message: 'expected header terminator 0x0D but found 0x20'},
        },
        {
            description: `DBF with unsupported file version in 'strict' (default) read mode`,
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            header: {version: 0x31},
            error: {kind: 'MalformedHeader', message: 'Unknown/unsupported dBase version: 49'},
        },
        {
            description: `DBF with unsupported file version in 'loose' read mode`,
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            header: {version: 0x31},
            options: {readMode: 'loose'},
            expectedRecords: [{NAME: 'HELLO'}],
        },
        {
            description: `DBF with duplicated field name in 'strict' (default) read mode`,
            fields: [{name: 'NAME', type: 'C', size: 3}, {name: 'NAME', type: 'C', size: 3}],
            records: [' abcxyz'],
            error: {kind: 'MalformedFieldDescriptor', message: `Duplicate field name: 'NAME'`},
        },
        {
            description: `DBF with duplicated field name in 'loose' read mode`,
            fields: [{name: 'NAME', type: 'C', size: 3}, {name: 'NAME', type: 'C', size: 3}],
            records: [' abcxyz'],
            options: {readMode: 'loose'},
            expectedRecords: [{NAME: 'xyz'}],
        },
        {
            description: `DBF with incorrect record length in 'strict' (default) read mode`,
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            header: {recordLength: 40},
            error: {kind: 'MalformedHeader', message: 'record length is 40 but the fields require 11'},
        },
        {
            description: `DBF with unsupported field type in 'strict' (default) read mode`,
            fields: [{name: 'CODE', type: 'C', size: 2}, {name: 'AMT', type: 'Y', size: 8}],
            records: [' AB' + '12345678'],
            error: {kind: 'MalformedFieldDescriptor', message: `AMT: Type 'Y' is not supported`},
        },
        {
            description: `DBF with unsupported field type in 'loose' read mode`,
            fields: [{name: 'CODE', type: 'C', size: 2}, {name: 'AMT', type: 'Y', size: 8}, {name: 'QTY', type: 'N', size: 2}],
            records: [' AB' + '12345678' + ' 5', ' CD' + '87654321' + '10'],
            options: {readMode: 'loose'},
            expectedRecords: [{CODE: 'AB', QTY: 5}, {CODE: 'CD', QTY: 10}],
        },
        {
            description: `DBF with invalid numeric data in 'strict' (default) read mode`,
            fields: [{name: 'QTY', type: 'N', size: 3}],
            records: ['  12', ' abc'],
            error: {kind: 'InvalidFieldData', message: `QTY: 'abc' is not a number`},
        },
        {
            description: `DBF with invalid numeric data in 'loose' read mode`,
            fields: [{name: 'QTY', type: 'N', size: 3}],
            records: ['  12', ' abc'],
            options: {readMode: 'loose'},
            expectedRecords: [{QTY: 12}, {QTY: null}],
        },
        {
            description: 'DBF with header length too small to hold a terminator',
            fields: [],
            records: [],
            header: {headerLength: 32},
            error: {kind: 'MalformedHeader', message: 'header length 32 is smaller than 33'},
        },
        {
            description: 'DBF with header length that leaves no room for the terminator',
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            header: {headerLength: 64},
            error: {kind: 'MalformedHeader', message: 'header length 64 leaves no room for the terminator'},
        },
        {
            description: 'DBF with fewer records than the header declares',
            fields: [{name: 'NAME', type: 'C', size: 10}],
            records: [' HELLO     '],
            header: {recordCount: 3},
            error: {kind: 'IoError', message: 'Unexpected end of data: needed 10 bytes but only 0 remain'},
        },
    ];

    tests.forEach(test => {
        it(test.description, () => {
            let data = buildDbf(test.fields, test.records, test.header);
            let expectedError = test.error;

            let reader: Reader;
            let records: DbfRecord[];
            try {
                reader = new Reader(new BufferSource(data), test.options);
                records = reader.readRecords();
            }
            catch (err) {
                if (!isDbfError(err)) throw err;
                expect(err.kind).equals(expectedError?.kind ?? '??????');
                expect(err.message).contains(expectedError?.message ?? '??????');
                return;
            }
            expect(undefined, 'an error was expected').equals(expectedError);
            expect(reader.recordCount, 'the record count should match').equals(test.records.length);
            expect(reader.descriptors.length, 'the descriptor table should include the deletion flag').equals(test.fields.length + 1);
            expect(records, 'the records should match').deep.equals(test.expectedRecords);
        });
    });

    it('reads the date of last update from the header', () => {
        let data = buildDbf(people, peopleRecords, {lastUpdate: [1999, 3, 25]});
        let reader = new Reader(new BufferSource(data));
        expect(reader.header.dateOfLastUpdate).deep.equals(new Date('1999-03-25'));
        expect(reader.header.version).equals(0x03);
        expect(reader.header.headerLength).equals(32 + 5 * 32 + 1);
        expect(reader.header.recordLength).equals(31);
    });

    it('exposes the fields without the deletion flag', () => {
        let data = buildDbf(people, peopleRecords);
        let reader = new Reader(new BufferSource(data));
        expect(reader.fields.map(f => f.name)).deep.equals(['NAME', 'AGE', 'PRICE', 'ACTIVE', 'JOINED']);
        expect(reader.fields[2]).deep.equals({name: 'PRICE', type: 'N', size: 8, decimalPlaces: 2});
        expect(reader.descriptors[0].name).equals('DeletionFlag');
    });
});




// Builds a Visual FoxPro record with an integer, a date-time and a memo block number.
function vfpRecord(id: number, julianDay: number, msSinceMidnight: number, memoBlock: number): Buffer {
    let buffer = Buffer.alloc(1 + 4 + 8 + 4);
    buffer.write(' ', 0, 'latin1');
    buffer.writeInt32LE(id, 1);
    buffer.writeInt32LE(julianDay, 5);
    buffer.writeInt32LE(msSinceMidnight, 9);
    buffer.writeInt32LE(memoBlock, 13);
    return buffer;
}
