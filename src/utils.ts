import { crc16xmodem } from 'crc';
import { UdfError, UdfErrorKind } from './errors';


function CheckBounds(buf: Buffer, offset: number, size: number) {
	if(offset < 0 || offset + size > buf.length) {
		throw new UdfError(
			UdfErrorKind.TruncatedBuffer,
			`Reading ${size} bytes at offset ${offset} overruns a ${buf.length} byte window`
		);
	}
}

export function ReadUint8(buf: Buffer, offset: number): number {
	CheckBounds(buf, offset, 1);
	return buf.readUInt8(offset);
}

export function ReadUint16(buf: Buffer, offset: number): number {
	CheckBounds(buf, offset, 2);
	return buf.readUInt16LE(offset);
}

export function ReadUint32(buf: Buffer, offset: number): number {
	CheckBounds(buf, offset, 4);
	return buf.readUInt32LE(offset);
}

/**
 * Gets a bounds checked copy-free view of bytes [offset, offset + size)
 */
export function ReadSlice(buf: Buffer, offset: number, size: number): Buffer {
	CheckBounds(buf, offset, size);
	return buf.subarray(offset, offset + size);
}


/**
 * CRC-16 with polynomial 0x1021 and an initial value of 0 as used in descriptor tags
 */
export function ComputeDescriptorCRC(data: Buffer): number {
	if(data.length === 0) {
		return 0;
	}

	return crc16xmodem(data);
}


/**
 * Finds the first nonzero byte in a range, or -1 if every byte is zero
 */
export function FindNonZero(buf: Buffer, start = 0, end = buf.length): number {
	for(let i = start; i < end; i++) {
		if(buf[i] !== 0) {
			return i;
		}
	}

	return -1;
}
