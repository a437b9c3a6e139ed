import { IsUdfError, UdfError, UdfErrorKind } from './errors';
import { FileReader, Reader } from './reader';
import { DetectSectorSize, ReadAnchor, SECTOR_SIZE_CANDIDATES } from './udf/anchor';
import {
	AnchorVolumeDescriptorPointer, LogicalVolumeDescriptor, PartitionDescriptor, PrimaryVolumeDescriptor
} from './udf/descriptors';
import { ByteRange, PartitionTable, ResolveExtent, ResolvePartitions } from './udf/partition';
import { ScanVolumeRecognition } from './udf/recognition';
import { MAX_SEQUENCE_EXTENTS, VolumeDescriptorSet, WalkVolumeDescriptorSequence } from './udf/sequence';
import { LongAllocationDescriptor, ParseLongAllocationDescriptor } from './udf/structs';


export interface ResolveOptions {
	requireRecognition?: boolean; /**< Fail with NotUdfVolume if the recognition sequence has no NSR markers. Defaults to true */
	useReserveSequence?: boolean; /**< Fall back to the reserve descriptor sequence if the main one is incomplete. Defaults to true */
	sectorSizes?: ReadonlyArray<number>; /**< Candidate sector sizes in the order they are probed */
	maxSequenceExtents?: number;
}

export interface VolumeMetadata {
	sectorSize: number;
	anchor: AnchorVolumeDescriptorPointer;
	primaryVolumeDescriptor: PrimaryVolumeDescriptor;
	partitionDescriptors: Map<number, PartitionDescriptor>; /**< Keyed by partition number */
	logicalVolumeDescriptor: LogicalVolumeDescriptor;
	logicalPartitions: PartitionTable; /**< Keyed by partition reference number */

	fileSetDescriptorAddress: LongAllocationDescriptor;
	fileSetDescriptorExtent: ByteRange; /**< Absolute location of the file set descriptor in the image */

	usedReserveSequence: boolean;
	warnings: string[]; /**< Everything suspicious that didn't stop the volume from being read */
}


async function WalkSequences(
	reader: Reader, sectorSize: number, anchor: AnchorVolumeDescriptorPointer, options: ResolveOptions
): Promise<{ set: VolumeDescriptorSet; reserve: boolean }> {

	let walkOptions = {
		maxExtents: options.maxSequenceExtents !== undefined ? options.maxSequenceExtents : MAX_SEQUENCE_EXTENTS
	};

	try {
		let set = await WalkVolumeDescriptorSequence(reader, sectorSize, anchor.mainExtent, walkOptions);
		return { set, reserve: false };
	}
	catch(e) {
		if(!IsUdfError(e, UdfErrorKind.RequiredDescriptorsMissing) || options.useReserveSequence === false || anchor.reserveExtent.length === 0) {
			throw e;
		}

		let set: VolumeDescriptorSet;
		try {
			set = await WalkVolumeDescriptorSequence(reader, sectorSize, anchor.reserveExtent, walkOptions);
		}
		catch(reserveError) {
			// Report the failure of the main sequence, not of its copy
			throw e;
		}

		set.warnings.unshift(`Using the reserve volume descriptor sequence: ${e.message}`);
		return { set, reserve: true };
	}
}

/**
 * Runs every step needed to go from a raw image to the location of the file set descriptor
 *
 * The reader isn't used directly: all reads go through a slice of it which is closed before returning
 */
export async function ResolveVolumeMetadata(reader: Reader, options: ResolveOptions = {}): Promise<VolumeMetadata> {

	let view = reader.slice();

	try {
		if(options.requireRecognition !== false) {
			let recognition = await ScanVolumeRecognition(view);
			if(!recognition.isUdf) {
				let seen = recognition.descriptors.map((d) => d.standardIdentifier).join(', ') || 'nothing';
				throw new UdfError(UdfErrorKind.NotUdfVolume, `Volume recognition sequence contains ${seen}`);
			}
		}

		let sectorSize = await DetectSectorSize(view, options.sectorSizes || SECTOR_SIZE_CANDIDATES);

		let anchor = await ReadAnchor(view, sectorSize);

		let { set, reserve } = await WalkSequences(view, sectorSize, anchor, options);

		let warnings = set.warnings.slice();
		if(!anchor.crcValid) {
			warnings.unshift('Anchor volume descriptor pointer has a bad CRC');
		}

		let logicalPartitions = ResolvePartitions(set.logicalVolume, set.partitions, sectorSize);

		let fsdAddress = ParseLongAllocationDescriptor(set.logicalVolume.contentsUse, 0);
		let fsdExtent = ResolveExtent(fsdAddress, logicalPartitions);

		return {
			sectorSize,
			anchor,
			primaryVolumeDescriptor: set.primary,
			partitionDescriptors: set.partitions,
			logicalVolumeDescriptor: set.logicalVolume,
			logicalPartitions,
			fileSetDescriptorAddress: fsdAddress,
			fileSetDescriptorExtent: fsdExtent,
			usedReserveSequence: reserve,
			warnings
		};
	}
	finally {
		await view.close();
	}
}


/**
 * An opened UDF image along with its resolved metadata
 */
export default class UdfVolume {

	/**
	 * Opens an image file and resolves its metadata
	 */
	public static async Open(fileName: string, options?: ResolveOptions) {
		let reader = await FileReader.Create(fileName);

		try {
			return await this.Load(reader, options);
		}
		catch(e) {
			await reader.close();
			throw e;
		}
	}

	/**
	 * Resolves the metadata of an image that is already open. The volume takes ownership of the reader
	 */
	public static async Load(reader: Reader, options?: ResolveOptions) {
		let metadata = await ResolveVolumeMetadata(reader, options);
		return new UdfVolume(reader, metadata);
	}

	public reader: Reader;
	public metadata: VolumeMetadata;

	protected constructor(reader: Reader, metadata: VolumeMetadata) {
		this.reader = reader;
		this.metadata = metadata;
	}

	close() {
		return this.reader.close();
	}

	get sectorSize() {
		return this.metadata.sectorSize;
	}

	get logicalBlockSize() {
		return this.metadata.logicalVolumeDescriptor.logicalBlockSize;
	}

	/**
	 * Converts a partition relative address on this volume into an absolute byte range
	 */
	resolveExtent(ad: LongAllocationDescriptor): ByteRange {
		return ResolveExtent(ad, this.metadata.logicalPartitions);
	}

}
