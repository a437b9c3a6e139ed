import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { IsUdfError, UdfErrorKind } from '../../src/errors';
import { BufferReader, FileReader } from '../../src/reader';


void test('BufferReader returns short reads at the end', async () => {
	let reader = new BufferReader(Buffer.from([1, 2, 3, 4, 5]));
	reader.seek(3);
	let buf = await reader.readSome(4);
	assert.deepStrictEqual([...buf], [4, 5]);
	assert.strictEqual(reader.pos(), 5);
	assert.strictEqual((await reader.readSome(4)).length, 0);
});

void test('readBytes insists on the full length', async () => {
	let reader = new BufferReader(Buffer.alloc(10));
	reader.seek(8);
	await assert.rejects(reader.readBytes(4), (e: unknown) => IsUdfError(e, UdfErrorKind.TruncatedBuffer));
});

void test('BufferReader slices are independent views', async () => {
	let reader = new BufferReader(Buffer.from([0, 1, 2, 3, 4, 5, 6, 7]));
	let slice = reader.slice(2, 6);
	assert.strictEqual(await slice.length(), 4);
	slice.seek(1);
	reader.seek(7);
	assert.deepStrictEqual([...(await slice.readBytes(2))], [3, 4]);
	assert.strictEqual(reader.pos(), 7);
});

void test('FileReader reads an image from disk and shares the descriptor with slices', async () => {
	let dir = await fs.mkdtemp(path.join(os.tmpdir(), 'udf-meta-'));
	let file = path.join(dir, 'image.bin');
	await fs.writeFile(file, Buffer.from([10, 11, 12, 13, 14, 15]));

	try {
		let reader = await FileReader.Create(file);
		assert.strictEqual(await reader.length(), 6);

		let slice = reader.slice(2);
		assert.strictEqual(await slice.length(), 4);
		slice.skip(1);
		assert.deepStrictEqual([...(await slice.readBytes(2))], [13, 14]);
		assert.deepStrictEqual([...(await slice.readSome(8))], [15]);
		await slice.close();

		// Still usable after the slice was closed
		reader.seek(0);
		assert.deepStrictEqual([...(await reader.readBytes(2))], [10, 11]);
		await reader.close();
	}
	finally {
		await fs.rm(dir, { recursive: true, force: true });
	}
});
