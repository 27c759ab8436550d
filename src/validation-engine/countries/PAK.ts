/**
 * Pakistan. The father's name is printed "SURNAME, GIVEN" and, as in India,
 * holds the family name.
 */
import { surnameFromFatherName } from '../helpers';
import { getValue, withField } from '../../ocr/universal-record';
import type { CountryRule } from '../rule-types';

const PAK: CountryRule = {
  countryCode: 'PAK',
  countryName: 'Pakistan',
  apply(record) {
    let next = record;
    const fatherName = getValue(next, 'fatherName');
    if (fatherName.includes(', ')) {
      const [last = '', first = ''] = fatherName.split(', ');
      next = withField(next, 'fatherName', `${first} ${last}`);
    }
    return surnameFromFatherName(next);
  },
};

export default PAK;
