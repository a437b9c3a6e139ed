import { ReadSlice, ReadUint8, ReadUint16, ReadUint32 } from '../utils';


export interface ExtentDescriptor {
	length: number; /**< In bytes */
	location: number; /**< In logical sectors */
}

export const EXTENT_DESCRIPTOR_SIZE = 8;

export function ParseExtentDescriptor(buf: Buffer, offset: number): ExtentDescriptor {
	return {
		length: ReadUint32(buf, offset),
		location: ReadUint32(buf, offset + 4)
	};
}


export interface LogicalBlockAddress {
	blockNumber: number; /**< Relative to the start of the partition */
	partitionReference: number; /**< Index into the logical volume's partition map table */
}

export interface LongAllocationDescriptor {
	extentLength: number;
	address: LogicalBlockAddress;
	implementationUse: Buffer; /**< 6 bytes */
}

export function ParseLongAllocationDescriptor(buf: Buffer, offset: number): LongAllocationDescriptor {
	return {
		extentLength: ReadUint32(buf, offset),
		address: {
			blockNumber: ReadUint32(buf, offset + 4),
			partitionReference: ReadUint16(buf, offset + 8)
		},
		implementationUse: ReadSlice(buf, offset + 10, 6)
	};
}


export enum EntityIdentifierKind {
	Domain = 'domain',
	UDF = 'udf',
	Implementation = 'implementation',
	Application = 'application'
}

/**
 * A 'regid' naming who or what a structure conforms to
 */
export interface EntityIdentifier {
	kind: EntityIdentifierKind;
	flags: number;
	identifier: Buffer; /**< 23 bytes, usually ASCII padded with zeros */
	identifierSuffix: Buffer; /**< 8 bytes whose meaning depends on the kind */
}

export function ParseEntityIdentifier(buf: Buffer, offset: number, kind: EntityIdentifierKind): EntityIdentifier {
	return {
		kind,
		flags: ReadUint8(buf, offset),
		identifier: ReadSlice(buf, offset + 1, 23),
		identifierSuffix: ReadSlice(buf, offset + 24, 8)
	};
}

/**
 * The identifier bytes up to the first zero, as latin1 text
 */
export function EntityIdentifierString(id: EntityIdentifier): string {
	let end = id.identifier.indexOf(0);
	return id.identifier.toString('latin1', 0, end < 0 ? id.identifier.length : end);
}


export interface Timestamp {
	typeAndTimezone: number;
	year: number;
	month: number;
	day: number;
	hour: number;
	minute: number;
	second: number;
	centiseconds: number;
	hundredsOfMicroseconds: number;
	microseconds: number;
}

// Timezone offset meaning 'not specified'
const TIMEZONE_UNSPECIFIED = -2047;

export function ParseTimestamp(buf: Buffer, offset: number): Timestamp {
	return {
		typeAndTimezone: ReadUint16(buf, offset),
		year: (ReadUint16(buf, offset + 2) << 16) >> 16,
		month: ReadUint8(buf, offset + 4),
		day: ReadUint8(buf, offset + 5),
		hour: ReadUint8(buf, offset + 6),
		minute: ReadUint8(buf, offset + 7),
		second: ReadUint8(buf, offset + 8),
		centiseconds: ReadUint8(buf, offset + 9),
		hundredsOfMicroseconds: ReadUint8(buf, offset + 10),
		microseconds: ReadUint8(buf, offset + 11)
	};
}

/**
 * Converts a timestamp into a Date. Returns null if the timestamp is blank or isn't a local time with a known timezone
 */
export function TimestampToDate(ts: Timestamp): Date | null {
	let type = ts.typeAndTimezone >> 12;
	if(type !== 1 || ts.month === 0 || ts.day === 0) {
		return null;
	}

	// 12-bit two's complement minutes east of UTC
	let tz = ts.typeAndTimezone & 0x0fff;
	if(tz & 0x800) {
		tz -= 0x1000;
	}

	if(tz === TIMEZONE_UNSPECIFIED) {
		return null;
	}

	// Date.UTC would move years 0 to 99 into the 1900s
	let date = new Date(0);
	date.setUTCFullYear(ts.year, ts.month - 1, ts.day);
	date.setUTCHours(ts.hour, ts.minute, ts.second, ts.centiseconds * 10);
	return new Date(date.getTime() - tz * 60 * 1000);
}
