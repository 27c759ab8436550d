/**
 * Morocco. Places are printed in French: the place of birth ends in "MAROC"
 * and the place of issue reads "<OFFICE> DE <CITY>".
 */
import { boostKnownBirthPlace } from '../../services/normalization/place-of-birth';
import { getConfidence, getValue, withField } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const COUNTRY_SUFFIX = ' MAROC';

const MAR: CountryRule = {
  countryCode: 'MAR',
  countryName: 'Morocco',
  apply(record, ctx) {
    let next = record;

    // the generic place-of-birth pass ran before the suffix came off
    const placeOfBirth = getValue(next, 'placeOfBirth');
    if (placeOfBirth.endsWith(COUNTRY_SUFFIX)) {
      const place = placeOfBirth.slice(0, -COUNTRY_SUFFIX.length).trim();
      const confidence = boostKnownBirthPlace(place, getConfidence(next, 'placeOfBirth'), ctx);
      next = withField(next, 'placeOfBirth', place, confidence);
    }

    const placeOfIssue = getValue(next, 'placeOfIssue');
    const de = placeOfIssue.match(/\bDE\b/);
    if (de?.index !== undefined) {
      const city = placeOfIssue.slice(de.index + de[0].length).trim();
      if (city) next = withField(next, 'placeOfIssue', city);
    }

    return next;
  },
};

export default MAR;
