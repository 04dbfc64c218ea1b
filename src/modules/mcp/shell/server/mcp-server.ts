/**
 * MCP Server Factory
 *
 * Creates and configures the MCP server with all tools and resources.
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import {
  COMPARE_STATES_DESCRIPTION,
  COUNT_ESTABLISHMENTS_DESCRIPTION,
  GET_COORDINATES_DESCRIPTION,
  GET_ESTABLISHMENT_DESCRIPTION,
  GET_INDICATOR_METADATA_DESCRIPTION,
  GET_TIME_SERIES_DESCRIPTION,
  LIST_INDICATORS_DESCRIPTION,
  SEARCH_ACTIVITY_AREA_DESCRIPTION,
  SEARCH_ESTABLISHMENTS_DESCRIPTION,
  SEARCH_FULL_CATALOG_DESCRIPTION,
  SEARCH_INDICATORS_DESCRIPTION,
} from './tool-descriptions.js';
import { failedResult, successResult, type McpError } from '../../core/errors.js';
import {
  CompareStatesInputZod,
  CountEstablishmentsInputZod,
  GetCoordinatesInputZod,
  GetEstablishmentInputZod,
  GetIndicatorMetadataInputZod,
  GetTimeSeriesInputZod,
  ListIndicatorsInputZod,
  SearchActivityAreaInputZod,
  SearchEstablishmentsInputZod,
  SearchFullCatalogInputZod,
  SearchIndicatorsInputZod,
} from '../../core/schemas/zod-schemas.js';
import { compareStateIndicator } from '../../core/usecases/compare-state-indicator.js';
import { countEstablishments } from '../../core/usecases/count-establishments.js';
import { describeIndicator } from '../../core/usecases/describe-indicator.js';
import { getEstablishmentCoordinates } from '../../core/usecases/get-establishment-coordinates.js';
import { getEstablishment } from '../../core/usecases/get-establishment.js';
import { getTimeSeries } from '../../core/usecases/get-time-series.js';
import { listIndicators } from '../../core/usecases/list-indicators.js';
import { searchActivityArea } from '../../core/usecases/search-activity-area.js';
import { searchCatalog } from '../../core/usecases/search-catalog.js';
import { searchEstablishments } from '../../core/usecases/search-establishments.js';
import { searchIndicators } from '../../core/usecases/search-indicators.js';
import { getScianSectorsGuide } from '../resources/scian-sectors-guide.js';
import { getStateCodesGuide } from '../resources/state-codes-guide.js';

import type { McpToolDeps } from '../../core/ports.js';
import type { Result } from 'neverthrow';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Dependencies required to create the MCP server.
 */
export type CreateMcpServerDeps = McpToolDeps;

export const SERVER_NAME = 'inegi-mcp-server';
export const SERVER_VERSION = '0.1.0';

// ─────────────────────────────────────────────────────────────────────────────
// Server Instructions
// ─────────────────────────────────────────────────────────────────────────────

const SERVER_INSTRUCTIONS = `
# Estadísticas de México: indicadores y directorio de establecimientos

Este servidor consulta dos APIs públicas del INEGI:
- **Banco de Indicadores**: series de tiempo por país, estado o municipio
- **DENUE**: directorio de establecimientos con ubicación y actividad económica (SCIAN)

Los nombres de indicadores, actividades y áreas están en español; busque con términos en español.

## Herramientas

### Indicadores
- **buscar_indicadores**: tabla curada de indicadores frecuentes (sin llamada externa)
- **listar_indicadores_disponibles**: la tabla curada completa por categoría
- **buscar_catalogo_completo**: búsqueda aproximada en el catálogo completo
- **obtener_serie_temporal**: serie de un indicador en un área
- **comparar_estados**: un indicador en varios estados, con ranking
- **obtener_metadatos_indicador**: unidad, frecuencia, fuente y notas

### Establecimientos
- **buscar_establecimientos**: por término, por estado o alrededor de un punto
- **buscar_area_act**: por estado, municipio, actividad SCIAN y nombre
- **cuantificar_establecimientos**: conteo por actividad, área y tamaño (estrato)
- **obtener_establecimiento**: ficha completa de un establecimiento por su id
- **obtener_coordenadas_establecimientos**: coordenadas para mapear

## Claves geográficas
- "00" nacional, 2 dígitos estado ("09" Ciudad de México), 5 dígitos municipio ("14039")
- Consulte el recurso inegi://guides/state-codes para la lista de estados

## Flujo recomendado
1. buscar_indicadores → si no hay resultado, buscar_catalogo_completo
2. obtener_serie_temporal con el código encontrado
3. comparar_estados para contrastar entidades

## Formato de respuesta
- Las respuestas exitosas tienen la forma { ok: true, data }
- Los errores tienen la forma { ok: false, error: { code, message } }
- Un valor null en una serie significa "sin dato", no cero
- Una colección vacía significa cero coincidencias, no un error
`;

// ─────────────────────────────────────────────────────────────────────────────
// Tool Response Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Builds a successful MCP tool response with structured content */
const okResponse = <T>(data: T) => {
  const envelope = successResult(data);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(envelope) }],
    structuredContent: { ok: envelope.ok, data: envelope.data },
  };
};

/** Builds an error MCP tool response with structured content */
const errResponse = (error: McpError) => {
  const envelope = failedResult(error);
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(envelope) }],
    structuredContent: { ok: envelope.ok, error: { ...envelope.error } },
    isError: true as const,
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Server Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates a configured MCP server with all tools registered.
 */
export function createMcpServer(deps: CreateMcpServerDeps): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      instructions: SERVER_INSTRUCTIONS,
      capabilities: {
        tools: {},
        resources: {},
      },
    }
  );

  const log = deps.logger.child({ component: 'mcp' });

  const respond = <T>(tool: string, result: Result<T, McpError>) => {
    if (result.isErr()) {
      log.debug({ tool, code: result.error.code }, result.error.message);
      return errResponse(result.error);
    }
    return okResponse(result.value);
  };

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools: indicators
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'buscar_indicadores',
    {
      description: SEARCH_INDICATORS_DESCRIPTION,
      inputSchema: SearchIndicatorsInputZod.shape,
    },
    (args) => respond('buscar_indicadores', searchIndicators(args))
  );

  server.registerTool(
    'buscar_catalogo_completo',
    {
      description: SEARCH_FULL_CATALOG_DESCRIPTION,
      inputSchema: SearchFullCatalogInputZod.shape,
    },
    async (args) => respond('buscar_catalogo_completo', await searchCatalog(deps, args))
  );

  server.registerTool(
    'obtener_serie_temporal',
    {
      description: GET_TIME_SERIES_DESCRIPTION,
      inputSchema: GetTimeSeriesInputZod.shape,
    },
    async (args) => respond('obtener_serie_temporal', await getTimeSeries(deps, args))
  );

  server.registerTool(
    'comparar_estados',
    {
      description: COMPARE_STATES_DESCRIPTION,
      inputSchema: CompareStatesInputZod.shape,
    },
    async (args) => respond('comparar_estados', await compareStateIndicator(deps, args))
  );

  server.registerTool(
    'listar_indicadores_disponibles',
    {
      description: LIST_INDICATORS_DESCRIPTION,
      inputSchema: ListIndicatorsInputZod.shape,
    },
    () => okResponse(listIndicators())
  );

  server.registerTool(
    'obtener_metadatos_indicador',
    {
      description: GET_INDICATOR_METADATA_DESCRIPTION,
      inputSchema: GetIndicatorMetadataInputZod.shape,
    },
    async (args) =>
      respond('obtener_metadatos_indicador', await describeIndicator(deps, args))
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Tools: business registry
  // ─────────────────────────────────────────────────────────────────────────

  server.registerTool(
    'buscar_establecimientos',
    {
      description: SEARCH_ESTABLISHMENTS_DESCRIPTION,
      inputSchema: SearchEstablishmentsInputZod.shape,
    },
    async (args) => respond('buscar_establecimientos', await searchEstablishments(deps, args))
  );

  server.registerTool(
    'buscar_area_act',
    {
      description: SEARCH_ACTIVITY_AREA_DESCRIPTION,
      inputSchema: SearchActivityAreaInputZod.shape,
    },
    async (args) => respond('buscar_area_act', await searchActivityArea(deps, args))
  );

  server.registerTool(
    'cuantificar_establecimientos',
    {
      description: COUNT_ESTABLISHMENTS_DESCRIPTION,
      inputSchema: CountEstablishmentsInputZod.shape,
    },
    async (args) =>
      respond('cuantificar_establecimientos', await countEstablishments(deps, args))
  );

  server.registerTool(
    'obtener_coordenadas_establecimientos',
    {
      description: GET_COORDINATES_DESCRIPTION,
      inputSchema: GetCoordinatesInputZod.shape,
    },
    async (args) =>
      respond(
        'obtener_coordenadas_establecimientos',
        await getEstablishmentCoordinates(deps, args)
      )
  );

  server.registerTool(
    'obtener_establecimiento',
    {
      description: GET_ESTABLISHMENT_DESCRIPTION,
      inputSchema: GetEstablishmentInputZod.shape,
    },
    async (args) => respond('obtener_establecimiento', await getEstablishment(deps, args))
  );

  // ─────────────────────────────────────────────────────────────────────────
  // Register Resources
  // ─────────────────────────────────────────────────────────────────────────

  server.registerResource(
    'state_codes_guide',
    'inegi://guides/state-codes',
    {
      title: 'Claves geoestadísticas',
      description: 'Claves de entidades federativas y formato de claves municipales',
      mimeType: 'text/markdown',
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: getStateCodesGuide(),
          mimeType: 'text/markdown',
        },
      ],
    })
  );

  server.registerResource(
    'scian_sectors_guide',
    'inegi://guides/scian-sectors',
    {
      title: 'Guía SCIAN',
      description: 'Sectores y niveles del clasificador de actividades económicas',
      mimeType: 'text/markdown',
    },
    (uri) => ({
      contents: [
        {
          uri: uri.href,
          text: getScianSectorsGuide(),
          mimeType: 'text/markdown',
        },
      ],
    })
  );

  return server;
}

/**
 * Creates and runs the MCP server with stdio transport.
 * This is used for running the server as a standalone process.
 */
export async function runMcpServerStdio(deps: CreateMcpServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
