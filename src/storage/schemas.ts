/**
 * JSON schemas for persisted records. Rows are checked on every read so a
 * corrupt payload surfaces as a StoreError instead of a malformed record.
 */

import { Ajv } from 'ajv';
import type { ValidateFunction } from 'ajv';
import { AUDIT_KINDS } from '../core/types.js';
import type { RecordKind, RecordTypes } from '../core/types.js';

const ajv = new Ajv({ strict: false, allErrors: true });

const identityId = { type: 'string', minLength: 1 };

const authoritySource = {
  type: 'object',
  required: ['identity', 'publicKey', 'secretKey'],
  properties: {
    identity: identityId,
    publicKey: { type: 'string' },
    secretKey: { type: 'string' },
  },
};

const auditHandle = {
  type: 'object',
  required: ['guid', 'counter'],
  properties: {
    guid: { type: 'string' },
    counter: { type: 'integer', minimum: 0 },
  },
};

const registrySchema = {
  type: 'object',
  required: ['authoritySource', 'auditHandles'],
  properties: {
    authoritySource,
    auditHandles: {
      type: 'object',
      required: [...AUDIT_KINDS],
      properties: Object.fromEntries(AUDIT_KINDS.map(kind => [kind, auditHandle])),
    },
  },
};

const sharedAccountSchema = {
  type: 'object',
  required: ['authoritySource'],
  properties: { authoritySource },
};

const managementSchema = {
  type: 'object',
  required: ['admin', 'unclaimed'],
  properties: {
    admin: identityId,
    unclaimed: { type: 'array', items: identityId, uniqueItems: true },
  },
};

const capabilitySchema = {
  type: 'object',
  required: ['target'],
  properties: { target: identityId },
};

export type RecordValidators = { [K in RecordKind]: ValidateFunction<RecordTypes[K]> };

export const recordValidators: RecordValidators = {
  registry: ajv.compile<RecordTypes['registry']>(registrySchema),
  shared_account: ajv.compile<RecordTypes['shared_account']>(sharedAccountSchema),
  management: ajv.compile<RecordTypes['management']>(managementSchema),
  capability: ajv.compile<RecordTypes['capability']>(capabilitySchema),
};

export function validationErrors(validate: ValidateFunction): string {
  return ajv.errorsText(validate.errors);
}
