/**
 * MCP Tool Descriptions
 *
 * Descriptions for each MCP tool with parameters, output and usage notes.
 */

export const SEARCH_INDICATORS_DESCRIPTION = `Busca indicadores en la tabla curada de indicadores frecuentes (población, empleo, precios, vivienda, educación, salud).

**Propósito:**
- Encontrar rápidamente el código de un indicador común sin consultar el catálogo completo
- No hace ninguna llamada a la API externa

**Parámetros:**
- keyword (requerido): palabra clave en el nombre del indicador o nombre de una categoría. No distingue acentos ni mayúsculas.

**Salida:**
- indicators: código, nombre, unidad, periodicidad, niveles geográficos y categoría
- suggestions: si no hubo coincidencias, la lista completa de indicadores curados

**Consejos:**
- Si no aparece lo que busca, use buscar_catalogo_completo
- Use el código devuelto en obtener_serie_temporal o comparar_estados`;

export const SEARCH_FULL_CATALOG_DESCRIPTION = `Búsqueda aproximada en el catálogo completo de indicadores del Banco de Indicadores.

**Propósito:**
- Encontrar indicadores que no están en la tabla curada
- Tolera errores de escritura y diferencias de acentos

**Parámetros:**
- keyword (requerido): texto a buscar; un código exacto aparece primero
- limite (opcional): número máximo de candidatos, de 1 a 50 (por defecto 10)

**Salida:**
- candidates: código, nombre y score (0 = coincidencia exacta, valores mayores = menos parecido), del mejor al peor

**Consejos:**
- El catálogo completo es grande; la primera consulta puede tardar varios segundos
- Revise los candidatos antes de pedir una serie: nombres parecidos pueden ser indicadores distintos`;

export const GET_TIME_SERIES_DESCRIPTION = `Obtiene la serie temporal de un indicador para el país, un estado o un municipio.

**Parámetros:**
- indicador_id (requerido): código numérico o texto; el texto se resuelve primero contra la tabla curada y después contra el catálogo completo
- historica (requerido): true para toda la serie, false solo para el dato más reciente
- codigo_geo (opcional): "00" nacional (por defecto), 2 dígitos para un estado ("09" Ciudad de México), 5 dígitos para un municipio ("14039" Guadalajara)

**Salida:**
- indicator y resolvedFrom ("curated" o "catalog"), con los candidatos considerados
- points: periodos en orden cronológico; value null significa "sin dato", no cero
- latest: último periodo con valor

**Errores comunes:**
- UNSUPPORTED_SCOPE: el indicador no se publica en ese nivel geográfico
- NOT_FOUND: el indicador no existe o no tiene datos para el área`;

export const COMPARE_STATES_DESCRIPTION = `Compara un indicador entre varias entidades federativas.

**Parámetros:**
- indicador_id (requerido): código numérico o texto del indicador
- estados (requerido): lista de claves de 2 dígitos, p. ej. ["09", "14", "19"] (máximo 32)
- historica (opcional): incluir la serie completa de cada estado (por defecto solo el dato más reciente)

**Salida:**
- entries: un elemento por estado, en el orden pedido; un estado que falla trae su propio error y no afecta a los demás
- ranking: estados con dato ordenados de mayor a menor valor; valores iguales comparten lugar
- failed: número de estados sin resultado

**Consejos:**
- Compare indicadores en valores relativos (tasas, porcentajes) cuando los estados difieren mucho en tamaño`;

export const LIST_INDICATORS_DESCRIPTION = `Lista todos los indicadores de la tabla curada agrupados por categoría.

**Salida:**
- categories: categoría y sus indicadores (código, nombre, unidad, periodicidad, niveles geográficos)

No hace ninguna llamada a la API externa.`;

export const GET_INDICATOR_METADATA_DESCRIPTION = `Obtiene los metadatos publicados de un indicador: unidad, multiplicador, frecuencia, tema, fuente, fecha de actualización y notas.

**Parámetros:**
- indicador_id (requerido): código numérico del indicador

**Consejos:**
- Consulte la fuente y las notas antes de interpretar cambios bruscos en una serie`;

export const SEARCH_ESTABLISHMENTS_DESCRIPTION = `Busca establecimientos en el Directorio Estadístico Nacional de Unidades Económicas (DENUE).

**Modos:**
- Por término: busca en nombre y actividad en todo el país o en un estado (entidad)
- Por cercanía: con latitud y longitud busca alrededor del punto dentro de radio metros

**Parámetros:**
- termino (requerido): palabra a buscar, p. ej. "farmacia"; en búsqueda por cercanía "todos" devuelve cualquier establecimiento
- limite (opcional): máximo de establecimientos, de 1 a 5000 (por defecto 10)
- entidad (opcional): clave de 2 dígitos del estado; no se combina con coordenadas
- latitud, longitud (opcionales, juntas): punto central en grados decimales
- radio (opcional): metros, mayor que 0 y hasta 5000 (por defecto 250)

**Salida:**
- establishments: id, nombre, actividad con sector, subsector y rama, dirección, coordenadas (null si faltan), AGEB, manzana y datos de contacto
- hasMore: hay más resultados que los devueltos
- partialFailure: error de una página posterior; los resultados anteriores se conservan`;

export const SEARCH_ACTIVITY_AREA_DESCRIPTION = `Busca establecimientos por área geográfica, actividad económica y nombre.

**Parámetros:**
- entidad (requerido): clave de 2 dígitos; "00" para todo el país
- municipio (opcional): clave de 3 dígitos; "0" para todos (por defecto)
- nombre (opcional): nombre o parte del nombre; "0" para cualquiera (por defecto)
- limite (opcional): máximo de establecimientos, de 1 a 5000 (por defecto 10)
- clase (opcional): código SCIAN de 2 (sector), 3 (subsector), 4 (rama) o 6 (clase) dígitos

**Ejemplo:**
- Farmacias en Mérida: { entidad: "31", municipio: "050", clase: "464111" }`;

export const COUNT_ESTABLISHMENTS_DESCRIPTION = `Cuenta establecimientos de una actividad económica en un área.

**Parámetros:**
- actividad_economica (requerido): código SCIAN de 2, 3, 4 o 6 dígitos; "0" para todas
- area_geografica (requerido): "0" nacional, 2 dígitos estado, 5 dígitos municipio
- estrato (opcional): tamaño por personal ocupado; "0" todos (por defecto), "1" 0-5, "2" 6-10, "3" 11-30, "4" 31-50, "5" 51-100, "6" 101-250, "7" 251 y más

**Salida:**
- count: establecimientos contados registro por registro
- reportedTotal: total que reporta el DENUE para la misma consulta
- breakdown: conteo del DENUE por actividad (activityCode) y área (areaCode)
- warnings: diferencias entre ambos totales, conteos truncados o totales no disponibles
- truncated: el conteo se detuvo antes de recorrer todos los registros

**Consejos:**
- Para áreas grandes y sectores amplios el conteo puede truncarse; acote el área o la actividad`;

export const GET_COORDINATES_DESCRIPTION = `Devuelve las coordenadas de los establecimientos que coinciden con un término, listas para mapear.

**Parámetros:**
- termino (requerido): palabra a buscar
- limite (opcional): máximo de establecimientos (por defecto 5)
- latitud, longitud, radio (opcionales): igual que en buscar_establecimientos

**Salida:**
- establishments: id, nombre, dirección y coordenadas
- withoutCoordinates: cuántos no traen coordenadas (coordinates null, nunca 0,0)`;

export const GET_ESTABLISHMENT_DESCRIPTION = `Obtiene la ficha completa de un establecimiento del DENUE por su identificador.

**Parámetros:**
- id_establecimiento (requerido): identificador numérico, como lo devuelven buscar_establecimientos y buscar_area_act

**Salida:**
- establishment: nombre, actividad con sector, subsector y rama, dirección, coordenadas, estrato y datos de contacto
- Un identificador inexistente devuelve NOT_FOUND`;
