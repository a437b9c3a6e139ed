export { default as UdfVolume, ResolveVolumeMetadata } from './volume';
export type { ResolveOptions, VolumeMetadata } from './volume';
export { Reader, FileReader, BufferReader } from './reader';
export { UdfError, UdfErrorKind, IsUdfError } from './errors';
export { ReadUint8, ReadUint16, ReadUint32 } from './utils';

export * from './udf/tag';
export * from './udf/structs';
export * from './udf/descriptors';
export * from './udf/recognition';
export * from './udf/anchor';
export * from './udf/sequence';
export * from './udf/partition';
