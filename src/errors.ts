
export enum UdfErrorKind {
	TruncatedBuffer = 'TruncatedBuffer', /**< Fewer bytes available than a structure requires */
	MalformedTag = 'MalformedTag',
	UnknownTagIdentifier = 'UnknownTagIdentifier',
	UnexpectedTag = 'UnexpectedTag', /**< Valid tag, but the wrong kind of descriptor for where it was read */
	ChecksumMismatch = 'ChecksumMismatch',
	ReservedFieldNonZero = 'ReservedFieldNonZero',
	SectorSizeUndetectable = 'SectorSizeUndetectable',
	RequiredDescriptorsMissing = 'RequiredDescriptorsMissing',
	UnknownPartitionMapType = 'UnknownPartitionMapType',
	UnsupportedPartitionMapType = 'UnsupportedPartitionMapType',
	PartitionDescriptorMissing = 'PartitionDescriptorMissing',
	PartitionReferenceOutOfRange = 'PartitionReferenceOutOfRange',
	NotOstaCompliant = 'NotOstaCompliant',
	NotUdfVolume = 'NotUdfVolume' /**< The volume recognition sequence did not contain the UDF markers */
}

export class UdfError extends Error {
	public readonly kind: UdfErrorKind;

	constructor(kind: UdfErrorKind, message: string) {
		super(`${kind}: ${message}`);
		this.name = 'UdfError';
		this.kind = kind;
	}
}

/**
 * Whether or not the given value is a UdfError of the given kind
 */
export function IsUdfError(e: unknown, kind?: UdfErrorKind): e is UdfError {
	return e instanceof UdfError && (kind === undefined || e.kind === kind);
}
