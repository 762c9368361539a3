import { SEVERITY_NAME_LIST } from './wire.js';

export const ENTITY_SCHEMA_ID = 'entityDescriptor';

export const entityDescriptorSchema = {
  $id: ENTITY_SCHEMA_ID,
  type: 'object',
  required: ['name'],
  properties: {
    name: { type: 'string' },
    owner: { anyOf: [{ $ref: `${ENTITY_SCHEMA_ID}#` }, { type: 'null' }] },
    alive: { type: 'boolean' },
  },
} as const;

const nullableEntity = { anyOf: [{ $ref: `${ENTITY_SCHEMA_ID}#` }, { type: 'null' }] } as const;
const severityName = { type: 'string', enum: [...SEVERITY_NAME_LIST] } as const;
const finiteNumber = { type: 'number' } as const;

const logFields = {
  context: nullableEntity,
  message: { type: 'string' },
  level: severityName,
} as const;

// Discriminated by `type`; each branch only constrains `value`
const logValueSchema = {
  type: 'object',
  required: ['type', 'value'],
  properties: {
    type: { type: 'string', enum: ['bool', 'int', 'float', 'vector', 'rotator', 'object'] },
  },
  allOf: [
    {
      if: { properties: { type: { const: 'bool' } } },
      then: { properties: { value: { type: 'boolean' } } },
    },
    {
      if: { properties: { type: { const: 'int' } } },
      then: { properties: { value: { type: 'integer' } } },
    },
    {
      if: { properties: { type: { const: 'float' } } },
      then: { properties: { value: finiteNumber } },
    },
    {
      if: { properties: { type: { const: 'vector' } } },
      then: {
        properties: {
          value: {
            type: 'object',
            required: ['x', 'y', 'z'],
            properties: { x: finiteNumber, y: finiteNumber, z: finiteNumber },
          },
        },
      },
    },
    {
      if: { properties: { type: { const: 'rotator' } } },
      then: {
        properties: {
          value: {
            type: 'object',
            required: ['pitch', 'yaw', 'roll'],
            properties: { pitch: finiteNumber, yaw: finiteNumber, roll: finiteNumber },
          },
        },
      },
    },
    {
      if: { properties: { type: { const: 'object' } } },
      then: { properties: { value: nullableEntity } },
    },
  ],
} as const;

export const logRequestSchema = {
  type: 'object',
  required: ['message'],
  properties: logFields,
} as const;

export const logValueRequestSchema = {
  type: 'object',
  required: ['message', 'value'],
  properties: { ...logFields, value: logValueSchema },
} as const;

export const logOnValidityRequestSchema = {
  type: 'object',
  required: ['message', 'mode'],
  properties: {
    ...logFields,
    candidate: nullableEntity,
    mode: { type: 'string', enum: ['LogWhenValid', 'LogWhenInvalid'] },
  },
} as const;

export const logOnConditionRequestSchema = {
  type: 'object',
  required: ['message', 'condition', 'mode'],
  properties: {
    ...logFields,
    condition: { type: 'boolean' },
    mode: { type: 'string', enum: ['LogWhenTrue', 'LogWhenFalse'] },
  },
} as const;

export const displayThresholdRequestSchema = {
  type: 'object',
  required: ['level'],
  properties: { level: severityName },
} as const;
