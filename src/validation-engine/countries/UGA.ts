import { clearFields } from '../helpers';
import type { CountryRule } from '../rule-types';

const UGA: CountryRule = {
  countryCode: 'UGA',
  countryName: 'Uganda',
  apply: (record) => clearFields(record, ['middleName', 'motherName', 'fatherName']),
};

export default UGA;
