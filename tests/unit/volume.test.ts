import assert from 'node:assert/strict';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';
import { IsUdfError, UdfError, UdfErrorKind } from '../../src/errors';
import { BufferReader } from '../../src/reader';
import UdfVolume, { ResolveVolumeMetadata } from '../../src/volume';
import {
	BuildAnchor, BuildLogicalVolume, BuildPartition, BuildPrimary, BuildTerminating, CreateMinimalImage, ImageBuilder,
	PARTITION_LENGTH, PARTITION_START, TOTAL_SECTORS, Type1Map, Type2Map
} from '../fixtures/udf-fixtures';
import { ExpectDefined } from '../helpers/expect-defined';


function Fails(kind: UdfErrorKind) {
	return (e: unknown): e is UdfError => IsUdfError(e, kind);
}

void test('resolves a minimal volume down to the file set descriptor', async () => {
	let meta = await ResolveVolumeMetadata(new BufferReader(CreateMinimalImage().data));

	assert.strictEqual(meta.sectorSize, 2048);
	assert.deepStrictEqual(meta.anchor.mainExtent, { length: 32768, location: 257 });
	assert.strictEqual(meta.primaryVolumeDescriptor.tag.tagLocation, 257);
	assert.deepStrictEqual([...meta.partitionDescriptors.keys()], [0]);
	assert.strictEqual(meta.logicalVolumeDescriptor.logicalBlockSize, 2048);
	assert.strictEqual(meta.usedReserveSequence, false);
	assert.deepStrictEqual(meta.warnings, []);

	let part = ExpectDefined(meta.logicalPartitions.get(0));
	assert.deepStrictEqual(part.physical, { byteStart: PARTITION_START * 2048, byteLength: PARTITION_LENGTH * 2048 });

	assert.deepStrictEqual(meta.fileSetDescriptorAddress.address, { blockNumber: 0, partitionReference: 0 });
	assert.deepStrictEqual(meta.fileSetDescriptorExtent, { offset: 614400, length: 2048 });
	assert.ok(meta.fileSetDescriptorExtent.offset >= part.physical.byteStart);
	assert.ok(meta.fileSetDescriptorExtent.offset < part.physical.byteStart + part.physical.byteLength);
});

void test('resolves a volume with 4096 byte sectors', async () => {
	let meta = await ResolveVolumeMetadata(new BufferReader(CreateMinimalImage(4096).data));
	assert.strictEqual(meta.sectorSize, 4096);
	assert.deepStrictEqual(meta.fileSetDescriptorExtent, { offset: PARTITION_START * 4096, length: 4096 });
});

void test('the caller\'s reader position is left alone', async () => {
	let reader = new BufferReader(CreateMinimalImage().data);
	reader.seek(5);
	await ResolveVolumeMetadata(reader);
	assert.strictEqual(reader.pos(), 5);
});

void test('images without a recognition sequence are not UDF unless told otherwise', async () => {
	let image = CreateMinimalImage();
	image.data.fill(0, 32768, 32768 + 3 * 2048);

	await assert.rejects(ResolveVolumeMetadata(new BufferReader(image.data)), Fails(UdfErrorKind.NotUdfVolume));

	let meta = await ResolveVolumeMetadata(new BufferReader(image.data), { requireRecognition: false });
	assert.strictEqual(meta.sectorSize, 2048);
});

void test('failures of each stage propagate unchanged', async () => {
	let noAnchor = CreateMinimalImage();
	noAnchor.put(256, Buffer.alloc(2048));
	await assert.rejects(ResolveVolumeMetadata(new BufferReader(noAnchor.data)), Fails(UdfErrorKind.SectorSizeUndetectable));

	let foreignDomain = CreateMinimalImage().put(259, BuildLogicalVolume(259, { maps: [Type1Map(0)], domain: '*Other' }));
	await assert.rejects(ResolveVolumeMetadata(new BufferReader(foreignDomain.data)), Fails(UdfErrorKind.NotOstaCompliant));

	let noPartition = CreateMinimalImage().put(259, BuildLogicalVolume(259, { maps: [Type1Map(0), Type1Map(9)] }));
	await assert.rejects(ResolveVolumeMetadata(new BufferReader(noPartition.data)), Fails(UdfErrorKind.PartitionDescriptorMissing));

	let badReference = CreateMinimalImage().put(259, BuildLogicalVolume(259, {
		maps: [Type1Map(0)],
		fileSetDescriptor: { extentLength: 2048, blockNumber: 0, partitionReference: 1 }
	}));
	await assert.rejects(ResolveVolumeMetadata(new BufferReader(badReference.data)), Fails(UdfErrorKind.PartitionReferenceOutOfRange));
});

void test('a volume whose only map is type 2 is reported as unsupported', async () => {
	let image = CreateMinimalImage().put(259, BuildLogicalVolume(259, { maps: [Type2Map('*UDF Metadata Partition')] }));
	await assert.rejects(ResolveVolumeMetadata(new BufferReader(image.data)), Fails(UdfErrorKind.UnsupportedPartitionMapType));
});


function ReserveImage(mainComplete: boolean, reserveComplete: boolean): ImageBuilder {
	let image = new ImageBuilder(2048, TOTAL_SECTORS)
		.recognition(['BEA01', 'NSR03', 'TEA01'])
		.put(256, BuildAnchor({ length: 16 * 2048, location: 257 }, { length: 16 * 2048, location: 320 }));

	for(let start of [257, 320]) {
		let complete = start === 257 ? mainComplete : reserveComplete;
		image.put(start, BuildPrimary(start, start === 257 ? 'MAIN' : 'RESERVE'));
		image.put(start + 1, BuildPartition(start + 1, 0, PARTITION_START, PARTITION_LENGTH));
		if(complete) {
			image.put(start + 2, BuildLogicalVolume(start + 2, { maps: [Type1Map(0)] }));
			image.put(start + 3, BuildTerminating(start + 3));
		}
	}

	return image;
}

void test('falls back to the reserve sequence when the main one is incomplete', async () => {
	let meta = await ResolveVolumeMetadata(new BufferReader(ReserveImage(false, true).data));
	assert.strictEqual(meta.usedReserveSequence, true);
	assert.strictEqual(meta.primaryVolumeDescriptor.volumeIdentifier.toString('latin1', 1, 8), 'RESERVE');
	assert.strictEqual(meta.warnings.length, 1);
	assert.ok(meta.warnings[0].startsWith('Using the reserve volume descriptor sequence: RequiredDescriptorsMissing'));
});

void test('the main sequence is preferred when complete', async () => {
	let meta = await ResolveVolumeMetadata(new BufferReader(ReserveImage(true, true).data));
	assert.strictEqual(meta.usedReserveSequence, false);
	assert.strictEqual(meta.primaryVolumeDescriptor.volumeIdentifier.toString('latin1', 1, 5), 'MAIN');
});

void test('the reserve sequence can be disabled', async () => {
	await assert.rejects(
		ResolveVolumeMetadata(new BufferReader(ReserveImage(false, true).data), { useReserveSequence: false }),
		Fails(UdfErrorKind.RequiredDescriptorsMissing)
	);
});

void test('when both sequences are incomplete the main failure is reported', async () => {
	await assert.rejects(
		ResolveVolumeMetadata(new BufferReader(ReserveImage(false, false).data)),
		(e: unknown) => Fails(UdfErrorKind.RequiredDescriptorsMissing)(e) && e.message.indexOf('sector 257') >= 0
	);
});

void test('UdfVolume.Load keeps the reader and resolves more extents', async () => {
	let vol = await UdfVolume.Load(new BufferReader(CreateMinimalImage().data));
	assert.strictEqual(vol.sectorSize, 2048);
	assert.strictEqual(vol.logicalBlockSize, 2048);

	let range = vol.resolveExtent({ extentLength: 4096, address: { blockNumber: 10, partitionReference: 0 }, implementationUse: Buffer.alloc(6) });
	assert.deepStrictEqual(range, { offset: 614400 + 20480, length: 4096 });
	await vol.close();
});

void test('UdfVolume.Open reads an image file', async () => {
	let dir = await fs.mkdtemp(path.join(os.tmpdir(), 'udf-meta-'));
	let file = path.join(dir, 'disc.iso');

	try {
		await fs.writeFile(file, CreateMinimalImage().data);
		let vol = await UdfVolume.Open(file);
		assert.deepStrictEqual(vol.metadata.fileSetDescriptorExtent, { offset: 614400, length: 2048 });
		await vol.close();

		await fs.writeFile(file, Buffer.alloc(64 * 1024));
		await assert.rejects(UdfVolume.Open(file), Fails(UdfErrorKind.NotUdfVolume));
	}
	finally {
		await fs.rm(dir, { recursive: true, force: true });
	}
});
