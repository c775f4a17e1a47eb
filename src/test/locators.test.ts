import * as assert from 'assert';
import * as fs from 'fs';
import * as path from 'path';
import { ExtractionError } from '../io/extractionError';
import { GaussianInputLocator } from '../io/locators/gaussianInputLocator';
import { MOLPRO_LAYOUT, MolproInputLocator, cleanGeometryEntries } from '../io/locators/molproInputLocator';
import { MOLPRO_TABLE_LAYOUT, MolproOutputLocator } from '../io/locators/molproOutputLocator';

const fixture = (name: string) => fs.readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');

function assertNotFound(fn: () => unknown): void {
	assert.throws(fn, (error: unknown) => error instanceof ExtractionError && error.kind === 'BlockNotFound');
}

suite('Gaussian input locator', () => {
	const locator = new GaussianInputLocator();

	test('reads the lines after charge/multiplicity', () => {
		const block = locator.locate(fixture('ch.com'));
		assert.deepStrictEqual(block.lines, ['H 0.0 0.0 0.7689', 'C 0.0 0.0 -0.3250']);
		assert.strictEqual(block.method, undefined);
	});

	test('handles multi-line titles and leading blank lines', () => {
		const content = ['', '%mem=1GB', '#P B3LYP/6-31G(d)', '', 'water', 'second title line', '', '0 1', 'O 0 0 0', 'H 0 0.757 0.587', ''].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['O 0 0 0', 'H 0 0.757 0.587']);
	});

	test('skips TV lattice vectors', () => {
		const content = ['#P PBEPBE', '', 'chain', '', '0 1', 'C 0 0 0', 'TV 2.5 0 0', 'H 0 1.09 0', ''].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['C 0 0 0', 'H 0 1.09 0']);
	});

	test('accepts ONIOM charge/multiplicity pairs', () => {
		const content = ['#P ONIOM(B3LYP/6-31G(d):UFF)', '', 'layers', '', '0 1 0 1 0 1', 'C 0 0 0', ''].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['C 0 0 0']);
	});

	test('falls back to scanning for charge/multiplicity', () => {
		const content = ['#P SP', 'title without separator', '', '0 1', 'H 0 0 0.7689'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689']);
	});

	test('stops at the first blank line', () => {
		const content = ['#P SP', '', 'title', '', '0 1', 'H 0 0 0', '', 'H 0', 'basis data'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0']);
	});

	test('fails without a charge/multiplicity line', () => {
		assertNotFound(() => locator.locate('#P SP\n\ntitle only\n'));
	});
});

suite('MOLPRO input locator', () => {
	const locator = new MolproInputLocator();

	test('reads a brace-delimited block without directives', () => {
		const block = locator.locate(fixture('ch.in'));
		assert.deepStrictEqual(block.lines, ['H,0.0,0.0,0.7689', 'C,0.0,0.0,-0.3250']);
		assert.strictEqual(block.layout, MOLPRO_LAYOUT);
	});

	test('uses the last geometry block', () => {
		const content = ['geometry={', 'H 0 0 0.9', 'C 0 0 -0.4', '}', 'hf', 'GEOM = {', 'H 0 0 0.7689', 'C 0 0 -0.3250', '}', 'ccsd(t)'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689', 'C 0 0 -0.3250']);
	});

	test('reads a one-line block', () => {
		const content = 'angstrom; geometry={H 0 0 0.7689; C 0 0 -0.3250}\nhf';
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689', 'C 0 0 -0.3250']);
	});

	test('reads a block opened after directives on the same line', () => {
		const content = ['symmetry,nosym;geometry={', 'H 0 0 0.7689', 'C 0 0 -0.3250', '}', 'hf'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689', 'C 0 0 -0.3250']);
		assert.deepStrictEqual(locator.locate('orient,mass;geom={O 0 0 0;H 0 1 1}\nhf').lines, ['O 0 0 0', 'H 0 1 1']);
	});

	test('reads a keyword-delimited block', () => {
		const content = ['Geometry', 'H 0 0 0.7689', '', 'C 0 0 -0.3250', 'END', 'hf'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689', 'C 0 0 -0.3250']);
	});

	test('drops the count and title of an XYZ-style block', () => {
		const content = ['geometry={', '2', '', 'H 0 0 0.7689', 'C 0 0 -0.3250', '}'].join('\n');
		assert.deepStrictEqual(locator.locate(content).lines, ['H 0 0 0.7689', 'C 0 0 -0.3250']);
	});

	test('drops comments and option lines', () => {
		assert.deepStrictEqual(
			cleanGeometryEntries(['! water', 'nosym', 'bohr', 'O 0 0 0 ! oxygen', 'mass,iso', '# note', 'orient=mass', 'H 0 1 1']),
			['O 0 0 0', 'H 0 1 1']
		);
	});

	test('ignores an unclosed block', () => {
		assertNotFound(() => locator.locate('geometry={\nH 0 0 0\n'));
	});

	test('fails without a geometry block', () => {
		assertNotFound(() => locator.locate('***,no geometry\nhf\n'));
	});
});

suite('MOLPRO output locator', () => {
	const locator = new MolproOutputLocator();

	test('prefers the ATOMIC COORDINATES table over the echoed input', () => {
		const block = locator.locate(fixture('ch.out'));
		assert.strictEqual(block.layout, MOLPRO_TABLE_LAYOUT);
		assert.deepStrictEqual(block.lines, [
			'1  H       1.00    0.000000000    0.000000000    0.768900000',
			'2  C       6.00    0.000000000    0.000000000   -0.325000000',
		]);
	});

	test('uses the last table of an optimization', () => {
		const block = locator.locate(fixture('opt.out'));
		assert.strictEqual(block.lines.length, 3);
		assert.strictEqual(block.lines[0], '1  O       8.00    0.000000000    0.000000000   -0.124000000');
	});

	test('falls back to the echoed geometry block', () => {
		const content = [' geometry={', ' H,0.0,0.0,0.7689', ' C,0.0,0.0,-0.3250', ' }', ' rhf', ' !RHF STATE 1.1 Energy  -37.5'].join('\n');
		const block = locator.locate(content);
		assert.strictEqual(block.layout, MOLPRO_LAYOUT);
		assert.deepStrictEqual(block.lines, ['H,0.0,0.0,0.7689', 'C,0.0,0.0,-0.3250']);
	});

	test('fails with neither table nor geometry', () => {
		assertNotFound(() => locator.locate(' Variable memory set to 100000000 words\n'));
	});
});
