import assert from 'node:assert/strict';
import { test } from 'node:test';
import { BufferReader } from '../../src/reader';
import { IsUdfVolume, ScanVolumeRecognition } from '../../src/udf/recognition';
import { ImageBuilder } from '../fixtures/udf-fixtures';


function Scan(ids: string[], sectors = 32) {
	let image = new ImageBuilder(2048, sectors).recognition(ids);
	return ScanVolumeRecognition(new BufferReader(image.data));
}

void test('a UDF recognition sequence is accepted', async () => {
	let res = await Scan(['BEA01', 'NSR02', 'TEA01']);
	assert.ok(res.isUdf);
	assert.strictEqual(res.nsrIdentifier, 'NSR02');
	assert.deepStrictEqual(res.descriptors.map((d) => d.offset), [32768, 34816, 36864]);
	assert.strictEqual(res.descriptors[0].structureVersion, 1);

	// The zero filled sector after the terminator ends the scan
	assert.ok(res.foreign);
	assert.strictEqual(res.foreign.offset, 38912);
});

void test('ISO 9660 and boot descriptors may share the sequence', async () => {
	let res = await Scan(['CD001', 'CD001', 'BEA01', 'BOOT2', 'NSR03', 'TEA01']);
	assert.ok(res.isUdf);
	assert.strictEqual(res.nsrIdentifier, 'NSR03');
});

void test('a plain ISO 9660 volume is not UDF', async () => {
	let res = await Scan(['CD001', 'CD001']);
	assert.strictEqual(res.isUdf, false);
	assert.strictEqual(res.nsrIdentifier, null);
});

void test('all three markers are needed', async () => {
	assert.strictEqual((await Scan(['BEA01', 'NSR02'])).isUdf, false);
	assert.strictEqual((await Scan(['NSR02', 'TEA01'])).isUdf, false);
	assert.strictEqual((await Scan(['BEA01', 'TEA01'])).isUdf, false);
});

void test('a foreign identifier halts the scan before later markers', async () => {
	let res = await Scan(['BEA01', 'XXXXX', 'NSR02', 'TEA01']);
	assert.strictEqual(res.isUdf, false);
	assert.ok(res.foreign);
	assert.strictEqual(res.foreign.standardIdentifier, 'XXXXX');
	assert.strictEqual(res.descriptors.length, 1);
});

void test('the scan ends at a short read', async () => {
	// Image ends right after the terminator
	let res = await Scan(['BEA01', 'NSR02', 'TEA01'], 19);
	assert.ok(res.isUdf);
	assert.strictEqual(res.foreign, null);
});

void test('images too small for the sequence are not UDF', async () => {
	assert.strictEqual(await IsUdfVolume(new BufferReader(Buffer.alloc(32768 + 2047))), false);
	assert.strictEqual(await IsUdfVolume(new BufferReader(new ImageBuilder(2048, 32).recognition(['BEA01', 'NSR02', 'TEA01']).data)), true);
});
