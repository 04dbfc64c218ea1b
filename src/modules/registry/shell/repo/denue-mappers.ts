/**
 * Registry payload schemas and record mapping.
 */

import { err, ok, type Result } from 'neverthrow';
import { z } from 'zod';

import { createMalformedResponseError, type MalformedResponseError } from '@/common/types/errors.js';

import type { Coordinates, Establishment } from '../../core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

const field = z.union([z.string(), z.number()]).nullish();

/** Only the fields the server reads; everything else passes through */
export const denueRecordSchema = z
  .object({
    Id: field,
    CLEE: field,
    Nombre: field,
    Razon_social: field,
    Clase_actividad: field,
    CLASE_ACTIVIDAD_ID: field,
    SECTOR_ACTIVIDAD_ID: field,
    SUBSECTOR_ACTIVIDAD_ID: field,
    RAMA_ACTIVIDAD_ID: field,
    Estrato: field,
    Tipo_vialidad: field,
    Calle: field,
    Num_Exterior: field,
    Num_Interior: field,
    Colonia: field,
    CP: field,
    Ubicacion: field,
    Telefono: field,
    Correo_e: field,
    Sitio_internet: field,
    Latitud: field,
    Longitud: field,
    AGEB: field,
    Manzana: field,
  })
  .passthrough();

export type DenueRecord = z.infer<typeof denueRecordSchema>;

/** The registry answers an empty search with null as often as with [] */
export const denueListSchema = z.array(denueRecordSchema).nullable();

export const quantifyRowSchema = z
  .object({
    AE: field,
    AG: field,
    Total: z.union([z.string(), z.number()]),
  })
  .passthrough();

export const quantifyListSchema = z.array(quantifyRowSchema).nullable();

// ─────────────────────────────────────────────────────────────────────────────
// Mapping
// ─────────────────────────────────────────────────────────────────────────────

const NO_NAME = 'Sin nombre';

export const text = (value: string | number | null | undefined): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  const trimmed = String(value).trim();
  return trimmed === '' ? null : trimmed;
};

const coordinate = (value: string | number | null | undefined): number | null => {
  const raw = text(value);
  if (raw === null) {
    return null;
  }
  const parsed = Number(raw);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Both coordinates or none */
export const toCoordinates = (record: DenueRecord): Coordinates | null => {
  const lat = coordinate(record.Latitud);
  const lon = coordinate(record.Longitud);
  return lat === null || lon === null ? null : { lat, lon };
};

/**
 * "{vialidad} {calle} {exterior} Int. {interior}, {colonia}, C.P. {cp}, {ubicacion}",
 * skipping whatever is missing.
 */
export const formatAddress = (record: DenueRecord): string => {
  const interior = text(record.Num_Interior);
  const street = [
    text(record.Tipo_vialidad),
    text(record.Calle),
    text(record.Num_Exterior),
    interior !== null ? `Int. ${interior}` : null,
  ]
    .filter((part): part is string => part !== null)
    .join(' ');

  const postalCode = text(record.CP);
  return [
    street === '' ? null : street,
    text(record.Colonia),
    postalCode !== null ? `C.P. ${postalCode}` : null,
    text(record.Ubicacion),
  ]
    .filter((part): part is string => part !== null)
    .join(', ');
};

export const toEstablishment = (
  record: DenueRecord
): Result<Establishment, MalformedResponseError> => {
  const id = text(record.Id) ?? text(record.CLEE);
  if (id === null) {
    return err(createMalformedResponseError('denue', 'establishment record without Id or CLEE'));
  }

  const activityCode = text(record.CLASE_ACTIVIDAD_ID);

  return ok({
    id,
    name: text(record.Nombre) ?? text(record.Razon_social) ?? NO_NAME,
    activityCode: activityCode !== null && /^\d{6}$/.test(activityCode) ? activityCode : null,
    activityDescription: text(record.Clase_actividad) ?? '',
    sectorCode: text(record.SECTOR_ACTIVIDAD_ID),
    subsectorCode: text(record.SUBSECTOR_ACTIVIDAD_ID),
    ramaCode: text(record.RAMA_ACTIVIDAD_ID),
    address: formatAddress(record),
    coordinates: toCoordinates(record),
    ageb: text(record.AGEB),
    manzana: text(record.Manzana),
    phone: text(record.Telefono),
    email: text(record.Correo_e),
    website: text(record.Sitio_internet),
    postalCode: text(record.CP),
    stratum: text(record.Estrato),
  });
};

/** Stops at the first record that cannot be identified */
export const toEstablishments = (
  records: readonly DenueRecord[]
): Result<Establishment[], MalformedResponseError> => {
  const establishments: Establishment[] = [];
  for (const record of records) {
    const mapped = toEstablishment(record);
    if (mapped.isErr()) {
      return err(mapped.error);
    }
    establishments.push(mapped.value);
  }
  return ok(establishments);
};
