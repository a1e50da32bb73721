import type { ToolDefinition, ToolExecutionContext } from '../tool-registry.js';
import type { ToolParametersSchema } from '../../../domain/tools/types.js';
import type { HospitalDirectory, HospitalSearchResult } from './hospital-directory.js';

interface FindHospitalsArgs {
  location: string;
  radius_km?: number;
  limit?: number;
  emergency_only?: boolean;
}

const PARAMETERS: ToolParametersSchema = {
  type: 'object',
  properties: {
    location: {
      type: 'string',
      minLength: 1,
      description: 'City, neighbourhood or address to search around',
    },
    radius_km: { type: 'number', minimum: 1, maximum: 50, description: 'Search radius in kilometres (default 10)' },
    limit: { type: 'integer', minimum: 1, maximum: 10, description: 'Maximum hospitals to return (default 5)' },
    emergency_only: { type: 'boolean', description: 'Only hospitals with an emergency department' },
  },
  required: ['location'],
  additionalProperties: false,
};

export class FindHospitalsTool implements ToolDefinition<FindHospitalsArgs, HospitalSearchResult> {
  name = 'find_hospitals';
  description = 'Find hospitals near a location, nearest first, with address, phone and emergency department flag.';
  parameters = PARAMETERS;

  constructor(private readonly directory: HospitalDirectory) {}

  async execute(args: FindHospitalsArgs, context: ToolExecutionContext): Promise<HospitalSearchResult> {
    return this.directory.search(
      {
        location: args.location.trim(),
        radiusKm: args.radius_km ?? 10,
        limit: args.limit ?? 5,
        emergencyOnly: args.emergency_only ?? false,
      },
      context.signal
    );
  }
}
