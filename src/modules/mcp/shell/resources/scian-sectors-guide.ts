/**
 * SCIAN Sectors Guide
 *
 * Top level of the North American industry classification used by the
 * business registry.
 */

export function getScianSectorsGuide(): string {
  return `# Guía SCIAN (Sistema de Clasificación Industrial de América del Norte)

## Niveles

1. **Sector** (2 dígitos): p. ej. 46 = Comercio al por menor
2. **Subsector** (3 dígitos): p. ej. 464 = Comercio al por menor de artículos para el cuidado de la salud
3. **Rama** (4 dígitos): p. ej. 4641
4. **Clase** (6 dígitos): p. ej. 464111 = Farmacias sin minisúper

Las herramientas de establecimientos aceptan cualquiera de los cuatro niveles; \`0\` significa todas las actividades.

## Sectores

| Código | Sector |
| --- | --- |
| 11 | Agricultura, cría y explotación de animales, aprovechamiento forestal, pesca y caza |
| 21 | Minería |
| 22 | Generación, transmisión y distribución de energía eléctrica, suministro de agua y de gas |
| 23 | Construcción |
| 31-33 | Industrias manufactureras |
| 43 | Comercio al por mayor |
| 46 | Comercio al por menor |
| 48-49 | Transportes, correos y almacenamiento |
| 51 | Información en medios masivos |
| 52 | Servicios financieros y de seguros |
| 53 | Servicios inmobiliarios y de alquiler de bienes muebles e intangibles |
| 54 | Servicios profesionales, científicos y técnicos |
| 55 | Corporativos |
| 56 | Servicios de apoyo a los negocios y manejo de residuos |
| 61 | Servicios educativos |
| 62 | Servicios de salud y de asistencia social |
| 71 | Servicios de esparcimiento culturales y deportivos, y otros servicios recreativos |
| 72 | Servicios de alojamiento temporal y de preparación de alimentos y bebidas |
| 81 | Otros servicios excepto actividades gubernamentales |
| 93 | Actividades legislativas, gubernamentales, de impartición de justicia y de organismos internacionales |

## Notas

- Los sectores 31-33 y 48-49 se consultan con cada código por separado (31, 32, 33; 48, 49).
- Las búsquedas por término o por cercanía devuelven solo la descripción de la actividad, sin código.
`;
}
