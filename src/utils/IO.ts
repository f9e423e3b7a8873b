// IO.ts - Import/export utilities for square matrices

import { parse } from 'csv-parse/sync';
import { InvalidMatrixError } from '../core/Errors';
import { Matrix } from '../core/Matrix';

export class IO {
    static importDelimited(text: string, delimiter: ',' | '\t' = ','): number[][] {
        const records: unknown = parse(text, {
            delimiter,
            skip_empty_lines: true,
            relax_column_count: true,
        });
        if (!Array.isArray(records)) throw new InvalidMatrixError('Delimited input must contain rows');

        const rows = records.map((record: unknown, i: number) => {
            if (!Array.isArray(record)) throw new InvalidMatrixError(`Row ${i} is not a list of cells`);
            return record.map((cell: unknown) => {
                const value = typeof cell === 'string' && cell.trim() !== '' ? Number(cell) : NaN;
                if (!Number.isFinite(value)) {
                    throw new InvalidMatrixError(`Row ${i} contains a non-numeric cell: ${String(cell)}`);
                }
                return value;
            });
        });
        return Matrix.validateSquare(rows);
    }

    static exportDelimited(matrix: number[][], delimiter: ',' | '\t' = ','): string {
        return matrix.map(row => row.join(delimiter)).join('\n');
    }

    static importCSV(csv: string): number[][] {
        return this.importDelimited(csv, ',');
    }

    static exportCSV(matrix: number[][]): string {
        return this.exportDelimited(matrix, ',');
    }

    static importTSV(tsv: string): number[][] {
        return this.importDelimited(tsv, '\t');
    }

    static exportTSV(matrix: number[][]): string {
        return this.exportDelimited(matrix, '\t');
    }

    static importJSON(json: string): number[][] {
        let data: unknown;
        try {
            data = JSON.parse(json);
        } catch (err) {
            throw new InvalidMatrixError(`Failed to parse matrix JSON: ${err instanceof Error ? err.message : String(err)}`);
        }
        return Matrix.validateSquare(data);
    }

    static exportJSON(matrix: number[][]): string {
        return JSON.stringify(matrix);
    }
}
