import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  BUILDING_STATUSES,
  BUILDING_TYPES,
  BUILDING_USAGES,
  OWNER_TYPES,
  PARCEL_STATUSES,
} from '../types.js';
import type { FieldSyncService } from '../sync/index.js';

export function registerSubmitParcelTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'submit_parcel',
    {
      description:
        'Save a parcel captured in the field, with its buildings and owner, as one pending record. ' +
        'Address fields take ids from the local reference tables. ' +
        'Attachments are paths of site photos already on disk.',
      inputSchema: {
        status: z.enum(PARCEL_STATUSES).optional().describe('Parcel status (default: active)'),
        code: z.string().optional().describe('Parcel code'),
        cadastral_reference: z.string().optional(),
        commune_id: z.number().int().optional(),
        quartier_id: z.number().int().optional(),
        avenue_id: z.number().int().optional(),
        street: z.string().optional(),
        address_number: z.string().optional(),
        parcel_number: z.string().optional(),
        area_m2: z.number().nonnegative().optional(),
        latitude: z.number().optional(),
        longitude: z.number().optional(),
        data_source: z.string().optional(),
        attachments: z.array(z.string()).optional().describe('Paths of site photos'),
        buildings: z
          .array(
            z.object({
              building_type: z.enum(BUILDING_TYPES),
              usage: z.enum(BUILDING_USAGES),
              status: z.enum(BUILDING_STATUSES),
              floors: z.number().int().nonnegative().optional(),
              year_built: z.number().int().optional(),
              built_area_m2: z.number().nonnegative().optional(),
            }),
          )
          .optional(),
        owner: z
          .object({
            owner_type: z.enum(OWNER_TYPES),
            name: z.string().optional().describe('Person or company name'),
            tax_id: z.string().optional(),
            contact: z.string().optional(),
            postal_address: z.string().optional(),
          })
          .optional(),
      },
    },
    async (args) => {
      try {
        const bundle = service.submitParcel({
          status: args.status,
          code: args.code,
          cadastralReference: args.cadastral_reference,
          communeId: args.commune_id,
          quartierId: args.quartier_id,
          avenueId: args.avenue_id,
          street: args.street,
          addressNumber: args.address_number,
          parcelNumber: args.parcel_number,
          areaM2: args.area_m2,
          latitude: args.latitude,
          longitude: args.longitude,
          dataSource: args.data_source,
          attachments: args.attachments,
          buildings: args.buildings?.map((b) => ({
            buildingType: b.building_type,
            usage: b.usage,
            status: b.status,
            floors: b.floors,
            yearBuilt: b.year_built,
            builtAreaM2: b.built_area_m2,
          })),
          owner: args.owner && {
            ownerType: args.owner.owner_type,
            name: args.owner.name,
            taxId: args.owner.tax_id,
            contact: args.owner.contact,
            postalAddress: args.owner.postal_address,
          },
        });

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(
                {
                  id: bundle.parcel.id,
                  status: bundle.parcel.ledger.status,
                  buildings: bundle.buildings.length,
                  owner: bundle.owner !== null,
                },
                null,
                2,
              ),
            },
          ],
        };
      } catch (error) {
        return {
          content: [
            {
              type: 'text' as const,
              text: `Error saving parcel: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
