import { UdfError, UdfErrorKind } from '../errors';
import { ReadSlice, ReadUint8, ReadUint16 } from '../utils';
import { LogicalVolumeDescriptor, PartitionDescriptor } from './descriptors';
import {
	EntityIdentifier, EntityIdentifierKind, EntityIdentifierString, LongAllocationDescriptor, ParseEntityIdentifier
} from './structs';


export const OSTA_DOMAIN_IDENTIFIER = '*OSTA UDF Compliant';

export enum PartitionMapType {
	Type1 = 1, /**< Refers directly to a partition descriptor on this volume */
	Type2 = 2 /**< Identified by an entity identifier (virtual, sparable, metadata partitions) */
}

const TYPE1_MAP_SIZE = 6;
const TYPE2_MAP_SIZE = 64;

export interface Type1PartitionMap {
	type: PartitionMapType.Type1;
	volumeSequenceNumber: number;
	partitionNumber: number;
}

export interface Type2PartitionMap {
	type: PartitionMapType.Type2;
	partitionTypeIdentifier: EntityIdentifier;
	raw: Buffer; /**< The whole 64 byte map */
}

export type PartitionMap = Type1PartitionMap | Type2PartitionMap;


export interface PhysicalPartition {
	byteStart: number;
	byteLength: number;
}

/**
 * A partition as addressed through a logical volume. Addresses in long_ads are resolved against these
 */
export interface LogicalPartition {
	referenceNumber: number; /**< Index of the map in the logical volume's map table */
	map: PartitionMap;
	physical: PhysicalPartition | null; /**< Null for map types that can't be resolved */
	logicalBlockSize: number;
}

export type PartitionTable = Map<number, LogicalPartition>;


/**
 * Decodes the variable length partition maps stored in a logical volume descriptor
 */
export function ParsePartitionMaps(lvd: LogicalVolumeDescriptor): PartitionMap[] {
	let buf = lvd.partitionMaps;
	let maps: PartitionMap[] = [];

	let pos = 0;
	for(let i = 0; i < lvd.partitionMapCount; i++) {
		let type = ReadUint8(buf, pos);

		if(type === PartitionMapType.Type1) {
			maps.push({
				type: PartitionMapType.Type1,
				volumeSequenceNumber: ReadUint16(buf, pos + 2),
				partitionNumber: ReadUint16(buf, pos + 4)
			});
			pos += TYPE1_MAP_SIZE;
		}
		else if(type === PartitionMapType.Type2) {
			maps.push({
				type: PartitionMapType.Type2,
				partitionTypeIdentifier: ParseEntityIdentifier(buf, pos + 4, EntityIdentifierKind.UDF),
				raw: ReadSlice(buf, pos, TYPE2_MAP_SIZE)
			});
			pos += TYPE2_MAP_SIZE;
		}
		else {
			throw new UdfError(
				UdfErrorKind.UnknownPartitionMapType, `Partition map ${i} at offset ${pos} has type ${type}`
			);
		}
	}

	return maps;
}

export function IsOstaCompliant(lvd: LogicalVolumeDescriptor): boolean {
	return EntityIdentifierString(lvd.domainIdentifier).indexOf(OSTA_DOMAIN_IDENTIFIER) >= 0;
}

/**
 * Builds the table of logical partitions from the partition maps of a logical volume
 */
export function ResolvePartitions(
	lvd: LogicalVolumeDescriptor, partitions: Map<number, PartitionDescriptor>, sectorSize: number
): PartitionTable {

	if(!IsOstaCompliant(lvd)) {
		throw new UdfError(
			UdfErrorKind.NotOstaCompliant,
			`Domain identifier '${EntityIdentifierString(lvd.domainIdentifier)}' is not '${OSTA_DOMAIN_IDENTIFIER}'`
		);
	}

	let table: PartitionTable = new Map();

	ParsePartitionMaps(lvd).forEach((map, i) => {
		let physical: PhysicalPartition | null = null;

		if(map.type === PartitionMapType.Type1) {
			let pd = partitions.get(map.partitionNumber);
			if(!pd) {
				throw new UdfError(
					UdfErrorKind.PartitionDescriptorMissing,
					`Partition map ${i} refers to partition ${map.partitionNumber} which has no descriptor`
				);
			}

			physical = {
				byteStart: pd.startingLocation * sectorSize,
				byteLength: pd.length * sectorSize
			};
		}

		table.set(i, {
			referenceNumber: i,
			map,
			physical,
			logicalBlockSize: lvd.logicalBlockSize
		});
	});

	return table;
}


// The top two bits of an extent length give the extent type
const EXTENT_LENGTH_MASK = 0x3fffffff;

export interface ByteRange {
	offset: number; /**< Absolute offset in the image */
	length: number;
}

/**
 * Converts a partition relative address into an absolute range of bytes in the image
 */
export function ResolveExtent(ad: LongAllocationDescriptor, table: PartitionTable): ByteRange {
	let ref = ad.address.partitionReference;

	let part = table.get(ref);
	if(!part) {
		throw new UdfError(
			UdfErrorKind.PartitionReferenceOutOfRange, `Partition reference ${ref} not in a table of ${table.size}`
		);
	}

	if(part.physical === null) {
		throw new UdfError(
			UdfErrorKind.UnsupportedPartitionMapType,
			`Partition reference ${ref} uses a type ${part.map.type} map ('${PartitionMapName(part.map)}')`
		);
	}

	return {
		offset: part.physical.byteStart + ad.address.blockNumber * part.logicalBlockSize,
		length: ad.extentLength & EXTENT_LENGTH_MASK
	};
}

export function PartitionMapName(map: PartitionMap): string {
	if(map.type === PartitionMapType.Type1) {
		return `partition ${map.partitionNumber}`;
	}

	return EntityIdentifierString(map.partitionTypeIdentifier);
}
