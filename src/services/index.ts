export { PDFProcessor } from './pdf.processor.js';
export { Classifier } from './classifier.service.js';
export { TextExtractor } from './text-extractor.service.js';
export { PatternFieldMatcher, createFieldMatchers } from './field-matcher.js';
export type { FieldMatcher, FieldMatch } from './field-matcher.js';
export { Redactor } from './redactor.service.js';
export { FieldPreserver, encodableText, textBox } from './field-preserver.service.js';
export { MetadataScrubber, readInfoDictionary } from './metadata-scrubber.service.js';
