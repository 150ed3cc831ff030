import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { LEGAL_FORMS, RECORD_ORIGINS, TAXPAYER_TYPES, TAX_ID_TYPES } from '../types.js';
import type { FieldSyncService } from '../sync/index.js';

export function registerSubmitTaxpayerTool(server: McpServer, service: FieldSyncService): void {
  server.registerTool(
    'submit_taxpayer',
    {
      description:
        'Save a taxpayer record captured in the field. The record is stored locally as pending ' +
        'and is sent to the backend by the next export_records run. ' +
        'Address, activity and zone fields take ids from the local reference tables. ' +
        'Attachments are paths of identity-document photos already on disk; they are deleted ' +
        'once the record has been exported.',
      inputSchema: {
        taxpayer_type: z.enum(TAXPAYER_TYPES).describe('PHYSIQUE (person), MORALE (company) or INFORMEL'),
        phone1: z.string().min(1).describe('Main phone number'),
        origin: z.enum(RECORD_ORIGINS).describe('How the record was collected'),
        created_by: z.string().min(1).describe('Agent who captured the record'),
        tax_id: z.string().optional().describe('Tax identification number (NIF)'),
        tax_id_type: z.enum(TAX_ID_TYPES).optional(),
        last_name: z.string().optional(),
        middle_name: z.string().optional(),
        first_name: z.string().optional(),
        company_name: z.string().optional().describe('Company name for MORALE taxpayers'),
        phone2: z.string().optional(),
        email: z.string().optional(),
        commune_id: z.number().int().optional(),
        quartier_id: z.number().int().optional(),
        avenue_id: z.number().int().optional(),
        street: z.string().optional(),
        parcel_number: z.string().optional(),
        activity_id: z.number().int().optional(),
        zone_id: z.number().int().optional(),
        status: z.number().int().optional(),
        latitude: z.number().optional(),
        longitude: z.number().optional(),
        attachments: z.array(z.string()).optional().describe('Paths of identity-document photos'),
        registered_at: z.string().optional().describe('ISO-8601 registration date (defaults to now)'),
        legal_form: z.enum(LEGAL_FORMS).optional(),
        trade_register_number: z.string().optional().describe('RCCM number'),
      },
    },
    async (args) => {
      try {
        const taxpayer = service.submitTaxpayer({
          taxpayerType: args.taxpayer_type,
          phone1: args.phone1,
          origin: args.origin,
          createdBy: args.created_by,
          taxId: args.tax_id,
          taxIdType: args.tax_id_type,
          lastName: args.last_name,
          middleName: args.middle_name,
          firstName: args.first_name,
          companyName: args.company_name,
          phone2: args.phone2,
          email: args.email,
          communeId: args.commune_id,
          quartierId: args.quartier_id,
          avenueId: args.avenue_id,
          street: args.street,
          parcelNumber: args.parcel_number,
          activityId: args.activity_id,
          zoneId: args.zone_id,
          status: args.status,
          latitude: args.latitude,
          longitude: args.longitude,
          attachments: args.attachments,
          registeredAt: args.registered_at,
          legalForm: args.legal_form,
          tradeRegisterNumber: args.trade_register_number,
        });

        return {
          content: [
            {
              type: 'text' as const,
              text: JSON.stringify(
                { id: taxpayer.id, status: taxpayer.ledger.status, attachments: taxpayer.attachments.length },
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
              text: `Error saving taxpayer: ${error instanceof Error ? error.message : String(error)}`,
            },
          ],
          isError: true,
        };
      }
    },
  );
}
