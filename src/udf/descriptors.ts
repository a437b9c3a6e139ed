import { UdfError, UdfErrorKind } from '../errors';
import { FindNonZero, ReadSlice, ReadUint16, ReadUint32 } from '../utils';
import {
	EntityIdentifier, EntityIdentifierKind, ExtentDescriptor, EXTENT_DESCRIPTOR_SIZE, ParseEntityIdentifier,
	ParseExtentDescriptor, ParseTimestamp, Timestamp
} from './structs';
import { CheckDescriptorCRC, DecodeDescriptorTag, DescriptorTag, TagIdentifier, TagName } from './tag';


// Every volume descriptor occupies exactly this many bytes at the start of its sector
export const DESCRIPTOR_SIZE = 512;

// Offset of the partition map table in the logical volume descriptor
export const PARTITION_MAPS_OFFSET = 440;

interface OpaqueDescriptor {
	tag: DescriptorTag;
	crcValid: boolean; /**< Whether or not the descriptor body matches the CRC in the tag */
}

export interface PrimaryVolumeDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.PrimaryVolumeDescriptor;
	volumeDescriptorSequenceNumber: number;
	primaryVolumeDescriptorNumber: number;
	volumeIdentifier: Buffer; /**< 32 byte dstring */
	volumeSequenceNumber: number;
	maximumVolumeSequenceNumber: number;
	interchangeLevel: number;
	maximumInterchangeLevel: number;
	characterSetList: number;
	maximumCharacterSetList: number;
	volumeSetIdentifier: Buffer; /**< 128 byte dstring */
	descriptorCharacterSet: Buffer;
	explanatoryCharacterSet: Buffer;
	volumeAbstract: ExtentDescriptor;
	volumeCopyrightNotice: ExtentDescriptor;
	applicationIdentifier: EntityIdentifier;
	recordingTime: Timestamp;
	implementationIdentifier: EntityIdentifier;
	implementationUse: Buffer;
	predecessorSequenceLocation: number;
	flags: number;
}

export interface AnchorVolumeDescriptorPointer extends OpaqueDescriptor {
	type: TagIdentifier.AnchorVolumeDescriptorPointer;
	mainExtent: ExtentDescriptor; /**< Main volume descriptor sequence */
	reserveExtent: ExtentDescriptor; /**< Copy of the above sequence */
}

export interface VolumeDescriptorPointer extends OpaqueDescriptor {
	type: TagIdentifier.VolumeDescriptorPointer;
	volumeDescriptorSequenceNumber: number;
	nextExtent: ExtentDescriptor; /**< Where the sequence continues */
}

export interface ImplementationUseVolumeDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.ImplementationUseVolumeDescriptor;
	volumeDescriptorSequenceNumber: number;
	implementationIdentifier: EntityIdentifier;
	implementationUse: Buffer;
}

export interface PartitionDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.PartitionDescriptor;
	volumeDescriptorSequenceNumber: number;
	partitionFlags: number;
	partitionNumber: number;
	partitionContents: EntityIdentifier;
	partitionContentsUse: Buffer;
	accessType: number;
	startingLocation: number; /**< In logical sectors */
	length: number; /**< In logical sectors */
	implementationIdentifier: EntityIdentifier;
	implementationUse: Buffer;
}

export interface LogicalVolumeDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.LogicalVolumeDescriptor;
	volumeDescriptorSequenceNumber: number;
	descriptorCharacterSet: Buffer;
	logicalVolumeIdentifier: Buffer; /**< 128 byte dstring */
	logicalBlockSize: number;
	domainIdentifier: EntityIdentifier;
	contentsUse: Buffer; /**< 16 bytes. For UDF this is a long_ad pointing at the file set descriptor */
	mapTableLength: number;
	partitionMapCount: number;
	implementationIdentifier: EntityIdentifier;
	implementationUse: Buffer;
	integritySequenceExtent: ExtentDescriptor;
	partitionMaps: Buffer; /**< Raw map table of mapTableLength bytes */
}

export interface UnallocatedSpaceDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.UnallocatedSpaceDescriptor;
	volumeDescriptorSequenceNumber: number;
	allocationDescriptorCount: number;
	allocationDescriptors: ExtentDescriptor[]; /**< Only those that fit in the bytes read */
}

export interface TerminatingDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.TerminatingDescriptor;
}

export interface LogicalVolumeIntegrityDescriptor extends OpaqueDescriptor {
	type: TagIdentifier.LogicalVolumeIntegrityDescriptor;
	recordingTime: Timestamp;
	integrityType: number; /**< 0 = open, 1 = closed */
	nextIntegrityExtent: ExtentDescriptor;
	partitionCount: number;
	implementationUseLength: number;
}

export type VolumeDescriptor =
	PrimaryVolumeDescriptor | AnchorVolumeDescriptorPointer | VolumeDescriptorPointer |
	ImplementationUseVolumeDescriptor | PartitionDescriptor | LogicalVolumeDescriptor |
	UnallocatedSpaceDescriptor | TerminatingDescriptor | LogicalVolumeIntegrityDescriptor;


/**
 * Decodes the tag of a descriptor and makes sure that it is the kind we expect
 */
function ExpectTag(buf: Buffer, id: TagIdentifier): OpaqueDescriptor {
	if(buf.length < DESCRIPTOR_SIZE) {
		throw new UdfError(
			UdfErrorKind.TruncatedBuffer, `${TagName(id)} needs ${DESCRIPTOR_SIZE} bytes but only got ${buf.length}`
		);
	}

	let tag = DecodeDescriptorTag(buf);
	if(tag.tagIdentifier !== id) {
		throw new UdfError(
			UdfErrorKind.UnexpectedTag, `Expected ${TagName(id)} but found ${TagName(tag.tagIdentifier)}`
		);
	}

	return { tag, crcValid: CheckDescriptorCRC(tag, buf) };
}


export function ParseAnchorVolumeDescriptorPointer(buf: Buffer): AnchorVolumeDescriptorPointer {
	let base = ExpectTag(buf, TagIdentifier.AnchorVolumeDescriptorPointer);

	let nonZero = FindNonZero(buf, 32, DESCRIPTOR_SIZE);
	if(nonZero >= 0) {
		throw new UdfError(UdfErrorKind.ReservedFieldNonZero, `Anchor has a nonzero reserved byte at offset ${nonZero}`);
	}

	return {
		...base,
		type: TagIdentifier.AnchorVolumeDescriptorPointer,
		mainExtent: ParseExtentDescriptor(buf, 16),
		reserveExtent: ParseExtentDescriptor(buf, 24)
	};
}

export function ParsePrimaryVolumeDescriptor(buf: Buffer): PrimaryVolumeDescriptor {
	let base = ExpectTag(buf, TagIdentifier.PrimaryVolumeDescriptor);

	return {
		...base,
		type: TagIdentifier.PrimaryVolumeDescriptor,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		primaryVolumeDescriptorNumber: ReadUint32(buf, 20),
		volumeIdentifier: ReadSlice(buf, 24, 32),
		volumeSequenceNumber: ReadUint16(buf, 56),
		maximumVolumeSequenceNumber: ReadUint16(buf, 58),
		interchangeLevel: ReadUint16(buf, 60),
		maximumInterchangeLevel: ReadUint16(buf, 62),
		characterSetList: ReadUint32(buf, 64),
		maximumCharacterSetList: ReadUint32(buf, 68),
		volumeSetIdentifier: ReadSlice(buf, 72, 128),
		descriptorCharacterSet: ReadSlice(buf, 200, 64),
		explanatoryCharacterSet: ReadSlice(buf, 264, 64),
		volumeAbstract: ParseExtentDescriptor(buf, 328),
		volumeCopyrightNotice: ParseExtentDescriptor(buf, 336),
		applicationIdentifier: ParseEntityIdentifier(buf, 344, EntityIdentifierKind.Application),
		recordingTime: ParseTimestamp(buf, 376),
		implementationIdentifier: ParseEntityIdentifier(buf, 388, EntityIdentifierKind.Implementation),
		implementationUse: ReadSlice(buf, 420, 64),
		predecessorSequenceLocation: ReadUint32(buf, 484),
		flags: ReadUint16(buf, 488)
	};
}

export function ParseVolumeDescriptorPointer(buf: Buffer): VolumeDescriptorPointer {
	let base = ExpectTag(buf, TagIdentifier.VolumeDescriptorPointer);

	return {
		...base,
		type: TagIdentifier.VolumeDescriptorPointer,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		nextExtent: ParseExtentDescriptor(buf, 20)
	};
}

export function ParseImplementationUseVolumeDescriptor(buf: Buffer): ImplementationUseVolumeDescriptor {
	let base = ExpectTag(buf, TagIdentifier.ImplementationUseVolumeDescriptor);

	return {
		...base,
		type: TagIdentifier.ImplementationUseVolumeDescriptor,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		implementationIdentifier: ParseEntityIdentifier(buf, 20, EntityIdentifierKind.Implementation),
		implementationUse: ReadSlice(buf, 52, 460)
	};
}

export function ParsePartitionDescriptor(buf: Buffer): PartitionDescriptor {
	let base = ExpectTag(buf, TagIdentifier.PartitionDescriptor);

	return {
		...base,
		type: TagIdentifier.PartitionDescriptor,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		partitionFlags: ReadUint16(buf, 20),
		partitionNumber: ReadUint16(buf, 22),
		partitionContents: ParseEntityIdentifier(buf, 24, EntityIdentifierKind.UDF),
		partitionContentsUse: ReadSlice(buf, 56, 128),
		accessType: ReadUint32(buf, 184),
		startingLocation: ReadUint32(buf, 188),
		length: ReadUint32(buf, 192),
		implementationIdentifier: ParseEntityIdentifier(buf, 196, EntityIdentifierKind.Implementation),
		implementationUse: ReadSlice(buf, 228, 128)
	};
}

/**
 * Total bytes the logical volume descriptor in this buffer spans including its partition map table
 */
export function LogicalVolumeDescriptorSize(buf: Buffer): number {
	return PARTITION_MAPS_OFFSET + ReadUint32(buf, 264);
}

export function ParseLogicalVolumeDescriptor(buf: Buffer): LogicalVolumeDescriptor {
	let base = ExpectTag(buf, TagIdentifier.LogicalVolumeDescriptor);

	let mapTableLength = ReadUint32(buf, 264);

	return {
		...base,
		type: TagIdentifier.LogicalVolumeDescriptor,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		descriptorCharacterSet: ReadSlice(buf, 20, 64),
		logicalVolumeIdentifier: ReadSlice(buf, 84, 128),
		logicalBlockSize: ReadUint32(buf, 212),
		domainIdentifier: ParseEntityIdentifier(buf, 216, EntityIdentifierKind.Domain),
		contentsUse: ReadSlice(buf, 248, 16),
		mapTableLength,
		partitionMapCount: ReadUint32(buf, 268),
		implementationIdentifier: ParseEntityIdentifier(buf, 272, EntityIdentifierKind.Implementation),
		implementationUse: ReadSlice(buf, 304, 128),
		integritySequenceExtent: ParseExtentDescriptor(buf, 432),
		partitionMaps: ReadSlice(buf, PARTITION_MAPS_OFFSET, mapTableLength)
	};
}

export function ParseUnallocatedSpaceDescriptor(buf: Buffer): UnallocatedSpaceDescriptor {
	let base = ExpectTag(buf, TagIdentifier.UnallocatedSpaceDescriptor);

	let count = ReadUint32(buf, 20);
	let fit = Math.min(count, Math.floor((buf.length - 24) / EXTENT_DESCRIPTOR_SIZE));

	let allocationDescriptors: ExtentDescriptor[] = [];
	for(let i = 0; i < fit; i++) {
		allocationDescriptors.push(ParseExtentDescriptor(buf, 24 + i*EXTENT_DESCRIPTOR_SIZE));
	}

	return {
		...base,
		type: TagIdentifier.UnallocatedSpaceDescriptor,
		volumeDescriptorSequenceNumber: ReadUint32(buf, 16),
		allocationDescriptorCount: count,
		allocationDescriptors
	};
}

export function ParseTerminatingDescriptor(buf: Buffer): TerminatingDescriptor {
	let base = ExpectTag(buf, TagIdentifier.TerminatingDescriptor);

	return {
		...base,
		type: TagIdentifier.TerminatingDescriptor
	};
}

export function ParseLogicalVolumeIntegrityDescriptor(buf: Buffer): LogicalVolumeIntegrityDescriptor {
	let base = ExpectTag(buf, TagIdentifier.LogicalVolumeIntegrityDescriptor);

	return {
		...base,
		type: TagIdentifier.LogicalVolumeIntegrityDescriptor,
		recordingTime: ParseTimestamp(buf, 16),
		integrityType: ReadUint32(buf, 28),
		nextIntegrityExtent: ParseExtentDescriptor(buf, 32),
		partitionCount: ReadUint32(buf, 72),
		implementationUseLength: ReadUint32(buf, 76)
	};
}


type DescriptorParser = (buf: Buffer) => VolumeDescriptor;

const DescriptorParsers: { [id: number]: DescriptorParser | undefined } = {
	[TagIdentifier.PrimaryVolumeDescriptor]: ParsePrimaryVolumeDescriptor,
	[TagIdentifier.AnchorVolumeDescriptorPointer]: ParseAnchorVolumeDescriptorPointer,
	[TagIdentifier.VolumeDescriptorPointer]: ParseVolumeDescriptorPointer,
	[TagIdentifier.ImplementationUseVolumeDescriptor]: ParseImplementationUseVolumeDescriptor,
	[TagIdentifier.PartitionDescriptor]: ParsePartitionDescriptor,
	[TagIdentifier.LogicalVolumeDescriptor]: ParseLogicalVolumeDescriptor,
	[TagIdentifier.UnallocatedSpaceDescriptor]: ParseUnallocatedSpaceDescriptor,
	[TagIdentifier.TerminatingDescriptor]: ParseTerminatingDescriptor,
	[TagIdentifier.LogicalVolumeIntegrityDescriptor]: ParseLogicalVolumeIntegrityDescriptor
};

/**
 * Parses any of the volume structure descriptors based on its tag
 *
 * Returns undefined if the tag is valid but isn't one of the volume descriptors (e.g. a file structure tag)
 */
export function ParseVolumeDescriptor(buf: Buffer): VolumeDescriptor | undefined {
	let tag = DecodeDescriptorTag(buf);

	let parser = DescriptorParsers[tag.tagIdentifier];
	if(!parser) {
		return undefined;
	}

	return parser(buf);
}
