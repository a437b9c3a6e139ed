import { UdfError, UdfErrorKind } from '../errors';
import { Reader } from '../reader';
import { ComputeDescriptorCRC, ReadUint8, ReadUint16, ReadUint32 } from '../utils';


export const TAG_SIZE = 16;

export enum TagIdentifier {
	PrimaryVolumeDescriptor = 1,
	AnchorVolumeDescriptorPointer = 2,
	VolumeDescriptorPointer = 3,
	ImplementationUseVolumeDescriptor = 4,
	PartitionDescriptor = 5,
	LogicalVolumeDescriptor = 6,
	UnallocatedSpaceDescriptor = 7,
	TerminatingDescriptor = 8,
	LogicalVolumeIntegrityDescriptor = 9,

	// File structure tags (not parsed here)
	FileSetDescriptor = 256,
	FileIdentifierDescriptor = 257,
	FileEntry = 261,
	ExtendedAttributeHeaderDescriptor = 262
}

/**
 * The 16 byte header at the start of every descriptor
 */
export interface DescriptorTag {
	tagIdentifier: number;
	descriptorVersion: number; /**< 2 for NSR02 volumes, 3 for NSR03 */
	tagChecksum: number;
	tagSerialNumber: number;
	descriptorCRC: number;
	descriptorCRCLength: number; /**< Number of bytes after the tag covered by the CRC */
	tagLocation: number; /**< Sector at which the descriptor claims to be recorded */
}

export type TagResult =
	{ ok: true; tag: DescriptorTag } |
	{ ok: false; error: UdfError };


/**
 * Sum of the 16 tag bytes (skipping the checksum byte itself) truncated to 8 bits
 */
export function ComputeTagChecksum(buf: Buffer): number {
	let sum = 0;
	for(let i = 0; i < TAG_SIZE; i++) {
		if(i === 4) {
			continue;
		}

		sum += buf[i];
	}

	return sum & 0xff;
}

/**
 * Validates and parses the tag at the start of the given buffer
 */
export function ParseDescriptorTag(buf: Buffer): TagResult {
	if(buf.length < TAG_SIZE) {
		return {
			ok: false,
			error: new UdfError(UdfErrorKind.MalformedTag, `Tag needs ${TAG_SIZE} bytes but only got ${buf.length}`)
		};
	}

	let tag: DescriptorTag = {
		tagIdentifier: ReadUint16(buf, 0),
		descriptorVersion: ReadUint16(buf, 2),
		tagChecksum: ReadUint8(buf, 4),
		tagSerialNumber: ReadUint16(buf, 6),
		descriptorCRC: ReadUint16(buf, 8),
		descriptorCRCLength: ReadUint16(buf, 10),
		tagLocation: ReadUint32(buf, 12)
	};

	if(tag.tagIdentifier === 0) {
		return { ok: false, error: new UdfError(UdfErrorKind.UnknownTagIdentifier, 'Tag identifier is zero') };
	}

	let reserved = ReadUint8(buf, 5);
	if(reserved !== 0) {
		return {
			ok: false,
			error: new UdfError(UdfErrorKind.ReservedFieldNonZero, `Tag reserved byte is 0x${reserved.toString(16)}`)
		};
	}

	let sum = ComputeTagChecksum(buf);
	if(sum !== tag.tagChecksum) {
		return {
			ok: false,
			error: new UdfError(UdfErrorKind.ChecksumMismatch, `Tag checksum is ${tag.tagChecksum} but computed ${sum}`)
		};
	}

	return { ok: true, tag };
}

/**
 * Same as ParseDescriptorTag but throws on an invalid tag
 */
export function DecodeDescriptorTag(buf: Buffer): DescriptorTag {
	let res = ParseDescriptorTag(buf);
	if(!res.ok) {
		throw res.error;
	}

	return res.tag;
}

/**
 * Reads and validates a tag at the given absolute offset
 */
export async function ReadDescriptorTag(reader: Reader, offset: number): Promise<TagResult> {
	reader.seek(offset);
	let buf = await reader.readSome(TAG_SIZE);
	return ParseDescriptorTag(buf);
}

/**
 * Checks the CRC covering the descriptor body that follows the tag. A CRC range running past the buffer is never valid
 */
export function CheckDescriptorCRC(tag: DescriptorTag, buf: Buffer): boolean {
	let end = TAG_SIZE + tag.descriptorCRCLength;
	if(end > buf.length) {
		return false;
	}

	return ComputeDescriptorCRC(buf.subarray(TAG_SIZE, end)) === tag.descriptorCRC;
}

export function TagName(id: number): string {
	return TagIdentifier[id] || `Tag(${id})`;
}
