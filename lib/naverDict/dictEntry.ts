export type DictEntryRecord = {
  word: string;
  reading: string;
  meanings: string[];
  entryId: string;
  dictType: string;
};

/**
 * A single auto-complete hit.
 *
 * `reading` depends on the dictionary: the Korean sound/gloss for hanja,
 * a phonetic transcription for English, and so on. `dictType` is the tag the
 * service sent back, which normally equals the requested dictionary code.
 */
export class DictEntry {
  readonly word: string;
  readonly reading: string;
  readonly meanings: readonly string[];
  readonly entryId: string;
  readonly dictType: string;

  constructor(fields: DictEntryRecord) {
    this.word = fields.word;
    this.reading = fields.reading;
    this.meanings = Object.freeze([...fields.meanings]);
    this.entryId = fields.entryId;
    this.dictType = fields.dictType;
    Object.freeze(this);
  }

  toRecord(): DictEntryRecord {
    return {
      word: this.word,
      reading: this.reading,
      meanings: [...this.meanings],
      entryId: this.entryId,
      dictType: this.dictType,
    };
  }

  toJSON() {
    return this.toRecord();
  }
}
