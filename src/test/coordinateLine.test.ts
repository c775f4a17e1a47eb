import * as assert from 'assert';
import { parseCoordinateBlock, parseCoordinateLine, parseDecimal } from '../io/coordinateLine';
import { ExtractionError } from '../io/extractionError';
import { PUNCH_LAYOUT, STANDARD_ORIENTATION_LAYOUT } from '../io/locators/gaussianLogLocator';
import { MOLPRO_TABLE_LAYOUT } from '../io/locators/molproOutputLocator';

function assertMalformed(fn: () => unknown): void {
	assert.throws(fn, (error: unknown) => error instanceof ExtractionError && error.kind === 'MalformedLine');
}

suite('Coordinate line parsing', () => {
	test('reads symbol and XYZ', () => {
		const atom = parseCoordinateLine('  C   0.000000   -1.25   3.5e-2 ');
		assert.deepStrictEqual(atom.toJSON(), { element: 'C', x: 0, y: -1.25, z: 0.035 });
	});

	test('accepts atomic numbers and labels', () => {
		assert.strictEqual(parseCoordinateLine('8 0 0 0').element, 'O');
		assert.strictEqual(parseCoordinateLine('H12 0 0 0').element, 'H');
	});

	test('reads a Standard orientation row', () => {
		const atom = parseCoordinateLine('1   6   0   0.000000   0.000000  -0.325000', STANDARD_ORIENTATION_LAYOUT);
		assert.deepStrictEqual(atom.toJSON(), { element: 'C', x: 0, y: 0, z: -0.325 });
	});

	test('reads an older five-column Standard orientation row', () => {
		const atom = parseCoordinateLine('2   1   0.500000   0.000000   1.000000', STANDARD_ORIENTATION_LAYOUT);
		assert.deepStrictEqual(atom.toJSON(), { element: 'H', x: 0.5, y: 0, z: 1 });
	});

	test('reads archive entries with and without a freeze flag', () => {
		assert.deepStrictEqual(parseCoordinateLine('H,0.,0.,0.7689', PUNCH_LAYOUT).toJSON(), {
			element: 'H',
			x: 0,
			y: 0,
			z: 0.7689,
		});
		assert.deepStrictEqual(parseCoordinateLine('C,0,1.5,0.,-0.325', PUNCH_LAYOUT).toJSON(), {
			element: 'C',
			x: 1.5,
			y: 0,
			z: -0.325,
		});
	});

	test('reads a MOLPRO table row', () => {
		const atom = parseCoordinateLine('2  H1  1.00  0.000000000  1.431000000  0.985000000', MOLPRO_TABLE_LAYOUT);
		assert.deepStrictEqual(atom.toJSON(), { element: 'H', x: 0, y: 1.431, z: 0.985 });
	});

	test('rejects a line with three tokens', () => {
		assertMalformed(() => parseCoordinateLine('H 0.0 0.757'));
	});

	test('rejects a non-numeric coordinate', () => {
		assertMalformed(() => parseCoordinateLine('H 0.0 abc 0.587'));
		assertMalformed(() => parseCoordinateLine('H 0.0 1.0.0 0.587'));
		assertMalformed(() => parseCoordinateLine('H 0.0 NaN 0.587'));
	});

	test('rejects an element token that is no symbol or number', () => {
		assert.throws(
			() => parseCoordinateLine('0.5 0 0 0'),
			(error: unknown) =>
				error instanceof ExtractionError &&
				error.kind === 'MalformedLine' &&
				error.message === 'Invalid coordinate line: unrecognised element token "0.5"'
		);
	});

	test('keeps dummy atoms and ghost atom numbers', () => {
		assert.deepStrictEqual(parseCoordinateLine('X 0 0 2.0').toJSON(), { element: 'X', x: 0, y: 0, z: 2 });
		assert.strictEqual(parseCoordinateLine('3 0 0 0.0 0.0 2.0', STANDARD_ORIENTATION_LAYOUT).element, '0');
	});

	test('parseDecimal handles exponents and Fortran D notation', () => {
		assert.strictEqual(parseDecimal('1.5E+02'), 150);
		assert.strictEqual(parseDecimal('-2.5D-1'), -0.25);
		assert.strictEqual(parseDecimal('.5'), 0.5);
		assert.strictEqual(parseDecimal('0.'), 0);
		assert.strictEqual(parseDecimal('1e999'), null);
		assert.strictEqual(parseDecimal('Infinity'), null);
		assert.strictEqual(parseDecimal(''), null);
	});

	test('a bad line fails the whole block and names its position', () => {
		assert.throws(
			() => parseCoordinateBlock(['O 0 0 0', 'H 0 0.757', 'H 0 -0.757 0.587'], {
				delimiter: /\s+/,
				elementColumn: 0,
				coordinateColumn: 1,
			}),
			(error: unknown) =>
				error instanceof ExtractionError &&
				error.kind === 'MalformedLine' &&
				error.message ===
					'Invalid coordinate line: expected at least 4 fields, found 3 (block line 2: "H 0 0.757")'
		);
	});
});
