export enum TableKind {
  Wide = 'wide',
  ZeroWidth = 'zeroWidth',
}

export enum ByteEncoding {
  Utf8 = 'utf8',
  Narrow = 'narrow',
  Wide = 'wide',
}

export enum SourceKind {
  NativeText = 'NativeText',
  Utf8Bytes = 'Utf8Bytes',
  FixedWidthBytes = 'FixedWidthBytes',
}
