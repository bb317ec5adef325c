/**
 * Decoding of client messages. Every field is checked before a message
 * reaches the table handlers, so handlers can trust the shape.
 */

import type { Row, Variant } from '../types.js';
import { ROWS } from '../types.js';
import type { ClientMessage, WirePlacement } from './types.js';

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRow(value: unknown): value is Row {
  return ROWS.some(row => row === value);
}

function isVariant(value: unknown): value is Variant {
  return value === 'standard' || value === 'pineapple';
}

function requireString(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== 'string') {
    throw new Error(`Field "${key}" must be a string`);
  }
  return value;
}

function requireBoolean(fields: Fields, key: string): boolean {
  const value = fields[key];
  if (typeof value !== 'boolean') {
    throw new Error(`Field "${key}" must be a boolean`);
  }
  return value;
}

function requireNumber(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Field "${key}" must be a number`);
  }
  return value;
}

function optionalBoolean(fields: Fields, key: string): boolean | undefined {
  return fields[key] === undefined ? undefined : requireBoolean(fields, key);
}

function optionalVersion(fields: Fields): number | undefined {
  if (fields['expectedVersion'] === undefined) return undefined;
  const version = requireNumber(fields, 'expectedVersion');
  if (!Number.isInteger(version) || version < 0) {
    throw new Error('Field "expectedVersion" must be a non-negative integer');
  }
  return version;
}

function requireRow(fields: Fields, key: string): Row {
  const value = fields[key];
  if (!isRow(value)) {
    throw new Error(`Field "${key}" must be one of ${ROWS.join(', ')}`);
  }
  return value;
}

function requirePlacements(fields: Fields): WirePlacement[] {
  const value = fields['placements'];
  if (!Array.isArray(value)) {
    throw new Error('Field "placements" must be an array');
  }
  return value.map((entry: unknown) => {
    if (!isRecord(entry)) {
      throw new Error('Each placement must be an object with "card" and "row"');
    }
    return { card: requireString(entry, 'card'), row: requireRow(entry, 'row') };
  });
}

/**
 * Decode one client frame. Throws on malformed JSON, an unknown type or a
 * missing or mistyped field.
 */
export function parseClientMessage(text: string): ClientMessage {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error('Message is not valid JSON');
  }
  if (!isRecord(parsed)) {
    throw new Error('Message must be a JSON object');
  }

  const type = parsed['type'];
  switch (type) {
    case 'create-table': {
      const variant = parsed['variant'];
      if (!isVariant(variant)) {
        throw new Error('Field "variant" must be standard or pineapple');
      }
      return {
        type: 'create-table',
        variant,
        maxPlayers: requireNumber(parsed, 'maxPlayers'),
        displayName: requireString(parsed, 'displayName'),
        fantasyLandEnabled: optionalBoolean(parsed, 'fantasyLandEnabled'),
      };
    }
    case 'join-table':
      return {
        type: 'join-table',
        tableCode: requireString(parsed, 'tableCode'),
        displayName: requireString(parsed, 'displayName'),
      };
    case 'resume-session':
      return { type: 'resume-session', sessionToken: requireString(parsed, 'sessionToken') };
    case 'set-ready':
      return { type: 'set-ready', ready: requireBoolean(parsed, 'ready') };
    case 'leave-table':
      return { type: 'leave-table' };
    case 'start-game':
      return { type: 'start-game' };
    case 'next-hand':
      return { type: 'next-hand' };
    case 'place-card':
      return {
        type: 'place-card',
        card: requireString(parsed, 'card'),
        row: requireRow(parsed, 'row'),
        expectedVersion: optionalVersion(parsed),
      };
    case 'place-initial':
      return { type: 'place-initial', placements: requirePlacements(parsed), expectedVersion: optionalVersion(parsed) };
    case 'fantasy-land-layout':
      return {
        type: 'fantasy-land-layout',
        placements: requirePlacements(parsed),
        expectedVersion: optionalVersion(parsed),
      };
    case 'pineapple-turn':
      return {
        type: 'pineapple-turn',
        placements: requirePlacements(parsed),
        discard: requireString(parsed, 'discard'),
        expectedVersion: optionalVersion(parsed),
      };
    default:
      throw new Error(`Unknown message type: ${String(type)}`);
  }
}
