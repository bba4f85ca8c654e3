import type { Transform, TransformName, TransformOptions } from '../types/index.js';
import { convertToReadable } from './readable.js';
import { removeContactPictures } from './remove-pictures.js';
import { formatContactNumbers } from './format-numbers.js';
import { formatContactNames } from './format-names.js';
import { removeContactTypes } from './remove-types.js';
import { autoSetContactTypes } from './auto-set-types.js';
import { upgradeVersion } from './upgrade-version.js';

export { convertToReadable, decodeField } from './readable.js';
export { removeContactPictures } from './remove-pictures.js';
export { formatContactNumbers, formatPhoneNumber } from './format-numbers.js';
export { formatContactNames } from './format-names.js';
export { removeContactTypes } from './remove-types.js';
export { autoSetContactTypes, inferPhoneType, type InferredPhoneType } from './auto-set-types.js';
export { upgradeVersion } from './upgrade-version.js';

/** Portugal (+351), whose numbering plan the number rules follow. */
export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = { callingCode: '351' };

export const TRANSFORMS: Record<TransformName, Transform> = {
  readable: {
    name: 'readable',
    description: 'Decode quoted-printable values into plain text',
    summary: 'Converted quoted-printable encoding to readable format',
    apply: convertToReadable,
  },
  removePictures: {
    name: 'removePictures',
    description: 'Remove contact pictures (PHOTO)',
    summary: 'Removed contact pictures',
    apply: removeContactPictures,
  },
  formatNumbers: {
    name: 'formatNumbers',
    description: 'Strip the national calling code and group 9-digit numbers as XXX XXX XXX',
    summary: 'Formatted contact phone numbers',
    apply: formatContactNumbers,
  },
  formatNames: {
    name: 'formatNames',
    description: 'Build a missing or empty FN from N',
    summary: 'Formatted contact names',
    apply: formatContactNames,
  },
  removeTypes: {
    name: 'removeTypes',
    description: 'Remove TYPE information from phone numbers',
    summary: 'Removed phone number types',
    apply: removeContactTypes,
  },
  autoSetTypes: {
    name: 'autoSetTypes',
    description: 'Set HOME/CELL/VOICE on untyped phone numbers from their leading digit',
    summary: 'Automatically set contact types based on phone number patterns',
    apply: autoSetContactTypes,
  },
  upgradeVersion: {
    name: 'upgradeVersion',
    description: 'Upgrade vCard 2.1 records to 3.0',
    summary: 'Upgraded VCF from version 2.1 to 3.0',
    apply: upgradeVersion,
  },
};
