import { ConversionError, errorMessage } from './errors.js';
import { encodeRecord } from './iso2709.js';
import { silentLogger, type Logger } from './logger.js';
import { recordFromElement, serializeCollection } from './marcxml.js';
import { parseXml, type XmlElement } from './xml.js';
import type { MarcRecord, OutputCollection, OutputFormat } from './types.js';

/**
 * Collects per-description MARCXML documents into the output collection
 * and serialises it.
 */
export class RecordAssembler {
  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Build one record. Text is normalised to NFC first, so equal input graphs
   * give byte-identical records.
   */
  async buildRecord(document: string): Promise<MarcRecord> {
    let root: XmlElement;
    try {
      root = await parseXml(document.normalize('NFC'));
    } catch (error) {
      throw new ConversionError(`Failed to parse MARCXML record: ${errorMessage(error)}`, { cause: error });
    }
    return recordFromElement(root);
  }

  /**
   * Records in input order. A document that does not make a valid record is
   * dropped and noted in `warnings`.
   */
  async assemble(documents: string[]): Promise<OutputCollection> {
    const collection: OutputCollection = { records: [], warnings: [] };

    for (const [index, document] of documents.entries()) {
      try {
        collection.records.push(await this.buildRecord(document));
      } catch (error) {
        const warning = `Dropped record ${index + 1}: ${errorMessage(error)}`;
        collection.warnings.push(warning);
        this.logger.warn(warning);
      }
    }

    return collection;
  }

  /** Throws a ConversionError when `record` cannot be written as `format`. */
  checkWritable(record: MarcRecord, format: OutputFormat): void {
    if (format === 'marc') {
      encodeRecord(record);
    }
  }

  /**
   * A record that ISO 2709 cannot hold is left out of binary output and
   * noted in `warnings`.
   */
  serialize(collection: OutputCollection, format: OutputFormat): Buffer {
    if (format === 'marc') {
      const encoded: Buffer[] = [];
      for (const [index, record] of collection.records.entries()) {
        try {
          encoded.push(encodeRecord(record));
        } catch (error) {
          const warning = `Dropped record ${index + 1}: ${errorMessage(error)}`;
          collection.warnings.push(warning);
          this.logger.warn(warning);
        }
      }
      return Buffer.concat(encoded);
    }
    return Buffer.from(`${serializeCollection(collection.records)}\n`, 'utf8');
  }
}
