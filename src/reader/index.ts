export { CardReader, CardFileError, readCard, readCardMarkup, type CardReadResult } from './CardReader';
export { CardSVGReader, type SchemaRegion } from './CardSVGReader';
export { resolveReaderOptions, type CardReaderOptions, type ResolvedReaderOptions } from './options';
