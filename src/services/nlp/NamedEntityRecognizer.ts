import nlp from 'compromise';

export type EntityLabel = 'person' | 'location' | 'organization';

export interface NamedEntity {
  text: string;
  label: EntityLabel;
}

export interface NamedEntityRecognizer {
  recognize(text: string): NamedEntity[];
}

const clean = (value: string): string => value.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}.]+$/gu, '').trim();

/**
 * Local recogniser backed by compromise's people/places/organizations matchers.
 */
export class CompromiseRecognizer implements NamedEntityRecognizer {
  recognize(text: string): NamedEntity[] {
    const doc = nlp(text);
    const collect = (values: string[], label: EntityLabel): NamedEntity[] =>
      values.map(clean).filter((value) => value.length > 0).map((value) => ({ text: value, label }));

    return [
      ...collect(doc.people().out('array'), 'person'),
      ...collect(doc.places().out('array'), 'location'),
      ...collect(doc.organizations().out('array'), 'organization')
    ];
  }
}
