import { Reader } from '../reader';
import { ReadUint8 } from '../utils';


// The first 32KiB of a volume are reserved for system use
export const RECOGNITION_START = 32 * 1024;

// Volume structure descriptors are always recorded in 2048 byte sectors, whatever the logical sector size
export const RECOGNITION_SECTOR_SIZE = 2048;

const BEGIN_MARKER = 'BEA01';
const END_MARKER = 'TEA01';
const NSR_MARKERS = ['NSR02', 'NSR03'];

// Other structures allowed to share the sequence (boot, ISO 9660 and CD-WO descriptors)
const IGNORED_MARKERS = ['BOOT2', 'CD001', 'CDW02'];


export interface VolumeStructureDescriptor {
	offset: number;
	structureType: number;
	standardIdentifier: string;
	structureVersion: number;
}

export interface VolumeRecognitionResult {
	descriptors: VolumeStructureDescriptor[]; /**< Everything accepted before the scan ended */
	foreign: VolumeStructureDescriptor | null; /**< The descriptor that halted the scan, if any */

	hasBeginning: boolean;
	nsrIdentifier: string | null; /**< Which NSR marker was found */
	hasTerminator: boolean;

	isUdf: boolean;
}


/**
 * Walks the volume recognition sequence looking for the markers of an NSR (UDF) volume
 *
 * The scan stops at the first short read or the first descriptor with an identifier that doesn't belong in the sequence
 */
export async function ScanVolumeRecognition(reader: Reader): Promise<VolumeRecognitionResult> {
	let res: VolumeRecognitionResult = {
		descriptors: [],
		foreign: null,
		hasBeginning: false,
		nsrIdentifier: null,
		hasTerminator: false,
		isUdf: false
	};

	let size = await reader.length();
	if(size < RECOGNITION_START + RECOGNITION_SECTOR_SIZE) {
		return res;
	}

	let offset = RECOGNITION_START;
	reader.seek(offset);

	while(true) {
		let buf = await reader.readSome(RECOGNITION_SECTOR_SIZE);
		if(buf.length < RECOGNITION_SECTOR_SIZE) {
			break;
		}

		let desc: VolumeStructureDescriptor = {
			offset,
			structureType: ReadUint8(buf, 0),
			standardIdentifier: buf.toString('latin1', 1, 6),
			structureVersion: ReadUint8(buf, 6)
		};

		let id = desc.standardIdentifier;
		if(id === BEGIN_MARKER) {
			res.hasBeginning = true;
		}
		else if(NSR_MARKERS.indexOf(id) >= 0) {
			res.nsrIdentifier = id;
		}
		else if(id === END_MARKER) {
			res.hasTerminator = true;
		}
		else if(IGNORED_MARKERS.indexOf(id) < 0) {
			res.foreign = desc;
			break;
		}

		res.descriptors.push(desc);
		offset += RECOGNITION_SECTOR_SIZE;
	}

	res.isUdf = res.hasBeginning && res.nsrIdentifier !== null && res.hasTerminator;
	return res;
}

export async function IsUdfVolume(reader: Reader): Promise<boolean> {
	return (await ScanVolumeRecognition(reader)).isUdf;
}
