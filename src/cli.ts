#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { IsUdfError } from './errors';
import { PartitionMapName } from './udf/partition';
import { EntityIdentifierString, TimestampToDate } from './udf/structs';
import UdfVolume, { VolumeMetadata } from './volume';


/**
 * Shows a raw identifier both as hex and as text since we don't decode the character set
 */
function FormatIdentifier(raw: Buffer): string {
	let end = raw.length;
	while(end > 0 && raw[end - 1] === 0) {
		end--;
	}

	let bytes = raw.subarray(0, end);
	return `${bytes.toString('hex')} (${JSON.stringify(bytes.toString('latin1'))})`;
}

function Summarize(meta: VolumeMetadata) {
	let pvd = meta.primaryVolumeDescriptor;
	let lvd = meta.logicalVolumeDescriptor;
	let recorded = TimestampToDate(pvd.recordingTime);

	return {
		sectorSize: meta.sectorSize,
		volumeIdentifier: FormatIdentifier(pvd.volumeIdentifier),
		recorded: recorded ? recorded.toISOString() : null,
		logicalVolumeIdentifier: FormatIdentifier(lvd.logicalVolumeIdentifier),
		domain: EntityIdentifierString(lvd.domainIdentifier),
		logicalBlockSize: lvd.logicalBlockSize,
		mainSequence: meta.anchor.mainExtent,
		usedReserveSequence: meta.usedReserveSequence,
		partitions: Array.from(meta.logicalPartitions.values()).map((p) => ({
			reference: p.referenceNumber,
			map: PartitionMapName(p.map),
			byteStart: p.physical ? p.physical.byteStart : null,
			byteLength: p.physical ? p.physical.byteLength : null
		})),
		fileSetDescriptor: meta.fileSetDescriptorExtent
	};
}


const program = new Command();
program
	.name('udf-meta')
	.description('Resolves the structural metadata of a UDF disc image')
	.version('0.1.0')
	.argument('<image>', 'Path to the disc image')
	.option('--json', 'Print the summary as JSON')
	.option('--no-recognition', 'Don\'t require a UDF volume recognition sequence')
	.option('--no-reserve', 'Never fall back to the reserve descriptor sequence')
	.showHelpAfterError()
	.action(async (image: string, options: { json?: boolean; recognition: boolean; reserve: boolean }) => {
		let vol = await UdfVolume.Open(path.resolve(image), {
			requireRecognition: options.recognition,
			useReserveSequence: options.reserve
		});

		try {
			for(let w of vol.metadata.warnings) {
				console.warn('warning: ' + w);
			}

			let summary = Summarize(vol.metadata);
			if(options.json) {
				console.log(JSON.stringify(summary, null, 2));
				return;
			}

			console.log('Sector size:', summary.sectorSize);
			console.log('Volume identifier:', summary.volumeIdentifier);
			console.log('Recorded:', summary.recorded || 'unknown');
			console.log('Logical volume:', summary.logicalVolumeIdentifier);
			console.log('Domain:', summary.domain);
			console.log('Logical block size:', summary.logicalBlockSize);
			for(let p of summary.partitions) {
				let range = p.byteStart !== null ? `bytes ${p.byteStart} +${p.byteLength}` : 'unsupported';
				console.log(`Partition ${p.reference}: ${p.map}, ${range}`);
			}
			console.log(`File set descriptor: bytes ${summary.fileSetDescriptor.offset} +${summary.fileSetDescriptor.length}`);
		}
		finally {
			await vol.close();
		}
	});

program.parseAsync(process.argv).catch((e: unknown) => {
	if(IsUdfError(e)) {
		console.error(`Not a readable UDF image: ${e.message}`);
	}
	else {
		console.error(e);
	}

	process.exitCode = 1;
});
