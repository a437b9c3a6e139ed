import { IsUdfError, UdfError, UdfErrorKind } from '../errors';
import { Reader } from '../reader';
import {
	DESCRIPTOR_SIZE, ImplementationUseVolumeDescriptor, LogicalVolumeDescriptor, LogicalVolumeDescriptorSize,
	ParseVolumeDescriptor, PartitionDescriptor, PrimaryVolumeDescriptor, TerminatingDescriptor,
	UnallocatedSpaceDescriptor, VolumeDescriptor
} from './descriptors';
import { ExtentDescriptor } from './structs';
import { ReadDescriptorTag, TagIdentifier, TagName } from './tag';


// How many extents chained together by volume descriptor pointers will be followed
export const MAX_SEQUENCE_EXTENTS = 16;

/**
 * Everything captured from one volume descriptor sequence
 */
export interface VolumeDescriptorSet {
	primary: PrimaryVolumeDescriptor;
	partitions: Map<number, PartitionDescriptor>; /**< Keyed by partition number */
	logicalVolume: LogicalVolumeDescriptor;
	terminating: TerminatingDescriptor;

	implementationUse: ImplementationUseVolumeDescriptor[];
	unallocatedSpace: UnallocatedSpaceDescriptor | null;

	sectors: number[]; /**< Sectors that held a recognized descriptor, in the order walked */
	warnings: string[];
}

/**
 * Reads the descriptor whose tag was found at the given offset. Logical volume descriptors are re-read in full when their partition maps don't fit in one descriptor
 */
async function ReadVolumeDescriptor(reader: Reader, offset: number, id: number): Promise<VolumeDescriptor | undefined> {
	reader.seek(offset);
	let buf = await reader.readBytes(DESCRIPTOR_SIZE);

	if(id === TagIdentifier.LogicalVolumeDescriptor) {
		let fullSize = LogicalVolumeDescriptorSize(buf);
		if(fullSize > buf.length) {
			reader.seek(offset);
			buf = await reader.readBytes(fullSize);
		}
	}

	return ParseVolumeDescriptor(buf);
}

export interface SequenceWalkOptions {
	maxExtents?: number;
}


/**
 * Walks the sectors of a volume descriptor sequence collecting the descriptors needed to interpret the volume
 *
 * Sectors without a valid tag are skipped. When a kind of descriptor appears more than once, the later one wins. The walk ends as soon as a primary, partition, logical volume and terminating descriptor have all been seen
 */
export async function WalkVolumeDescriptorSequence(
	reader: Reader, sectorSize: number, extent: ExtentDescriptor, options: SequenceWalkOptions = {}
): Promise<VolumeDescriptorSet> {

	let maxExtents = options.maxExtents !== undefined ? options.maxExtents : MAX_SEQUENCE_EXTENTS;

	let totalSectors = Math.floor(await reader.length() / sectorSize);

	let primary: PrimaryVolumeDescriptor | null = null;
	let logicalVolume: LogicalVolumeDescriptor | null = null;
	let terminating: TerminatingDescriptor | null = null;
	let partitions = new Map<number, PartitionDescriptor>();
	let implementationUse: ImplementationUseVolumeDescriptor[] = [];
	let unallocatedSpace: UnallocatedSpaceDescriptor | null = null;

	let sectors: number[] = [];
	let warnings: string[] = [];

	let visited = new Set<number>();
	let current: ExtentDescriptor | null = extent;

	for(let hops = 0; current !== null && hops < maxExtents; hops++) {
		visited.add(current.location);

		let next: ExtentDescriptor | null = null;
		let end = Math.min(totalSectors, current.location + Math.ceil(current.length / sectorSize));

		for(let sector = current.location; sector < end; sector++) {
			let offset = sector * sectorSize;

			let res = await ReadDescriptorTag(reader, offset);
			if(!res.ok) {
				// Zero filled sectors are normal in the unused part of an extent
				if(res.error.kind !== UdfErrorKind.UnknownTagIdentifier) {
					warnings.push(`Skipping sector ${sector}: ${res.error.message}`);
				}
				continue;
			}

			let desc: VolumeDescriptor | undefined;
			try {
				desc = await ReadVolumeDescriptor(reader, offset, res.tag.tagIdentifier);
			}
			catch(e) {
				// Only this sector is lost
				if(!IsUdfError(e)) {
					throw e;
				}

				warnings.push(`Skipping sector ${sector}: ${e.message}`);
				continue;
			}

			if(!desc) {
				warnings.push(`Unexpected ${TagName(res.tag.tagIdentifier)} tag at sector ${sector}`);
				continue;
			}

			sectors.push(sector);

			if(desc.tag.tagLocation !== sector) {
				warnings.push(`${TagName(desc.type)} at sector ${sector} claims to be at sector ${desc.tag.tagLocation}`);
			}

			if(!desc.crcValid) {
				warnings.push(`${TagName(desc.type)} at sector ${sector} has a bad CRC`);
			}

			switch(desc.type) {
				case TagIdentifier.PrimaryVolumeDescriptor:
					primary = desc;
					break;
				case TagIdentifier.PartitionDescriptor:
					partitions.set(desc.partitionNumber, desc);
					break;
				case TagIdentifier.LogicalVolumeDescriptor:
					logicalVolume = desc;
					break;
				case TagIdentifier.TerminatingDescriptor:
					terminating = desc;
					break;
				case TagIdentifier.ImplementationUseVolumeDescriptor:
					implementationUse.push(desc);
					break;
				case TagIdentifier.UnallocatedSpaceDescriptor:
					unallocatedSpace = desc;
					break;
				case TagIdentifier.VolumeDescriptorPointer:
					next = desc.nextExtent;
					break;
				default:
					warnings.push(`Unexpected ${TagName(desc.type)} in volume descriptor sequence at sector ${sector}`);
			}

			if(primary && partitions.size > 0 && logicalVolume && terminating) {
				return {
					primary, partitions, logicalVolume, terminating,
					implementationUse, unallocatedSpace,
					sectors, warnings
				};
			}

			// A pointer is always the last thing recorded in its extent
			if(next) {
				break;
			}
		}

		if(next && visited.has(next.location)) {
			warnings.push(`Volume descriptor pointer loops back to sector ${next.location}`);
			break;
		}

		current = next;
	}

	let missing: string[] = [];
	if(!primary) { missing.push(TagName(TagIdentifier.PrimaryVolumeDescriptor)); }
	if(partitions.size === 0) { missing.push(TagName(TagIdentifier.PartitionDescriptor)); }
	if(!logicalVolume) { missing.push(TagName(TagIdentifier.LogicalVolumeDescriptor)); }
	if(!terminating) { missing.push(TagName(TagIdentifier.TerminatingDescriptor)); }

	throw new UdfError(
		UdfErrorKind.RequiredDescriptorsMissing,
		`Sequence at sector ${extent.location} is missing ${missing.join(', ')}`
	);
}
