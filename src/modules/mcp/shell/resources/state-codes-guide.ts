/**
 * State Codes Guide
 *
 * Geostatistical codes accepted by every tool that takes an area.
 */

import { NATIONAL_CODE, NATIONAL_NAME, STATE_NAMES } from '@/common/types/geo.js';

export function getStateCodesGuide(): string {
  const rows = Object.entries(STATE_NAMES)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([code, name]) => `| ${code} | ${name} |`)
    .join('\n');

  return `# Claves geoestadísticas

## Niveles

- **Nacional**: \`${NATIONAL_CODE}\` (${NATIONAL_NAME}). En cuantificar_establecimientos también se acepta \`0\`.
- **Estatal**: 2 dígitos, de \`01\` a \`32\`.
- **Municipal**: 5 dígitos, clave del estado seguida de la clave de municipio de 3 dígitos
  (p. ej. \`14039\` = municipio 039 de Jalisco).

## Entidades federativas

| Clave | Entidad |
| --- | --- |
${rows}
`;
}
