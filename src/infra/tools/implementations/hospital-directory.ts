/**
 * Hospital lookup backed by OpenStreetMap: Nominatim for geocoding and
 * Overpass for facilities around the resolved point.
 */

export interface HospitalQuery {
  location: string;
  radiusKm: number;
  limit: number;
  emergencyOnly: boolean;
}

export interface Hospital {
  name: string;
  address?: string;
  phone?: string;
  distanceKm: number;
  emergency: boolean;
}

export interface HospitalSearchResult {
  /** Resolved place name */
  location: string;
  hospitals: Hospital[];
}

export interface HospitalDirectory {
  search(query: HospitalQuery, signal?: AbortSignal): Promise<HospitalSearchResult>;
}

export class LocationNotFoundError extends Error {
  constructor(public readonly location: string) {
    super(`Could not find a place called '${location}'`);
    this.name = 'LocationNotFoundError';
  }
}

export interface OpenStreetMapDirectoryOptions {
  nominatimUrl?: string;
  overpassUrl?: string;
  userAgent?: string;
  fetchImpl?: typeof fetch;
}

interface Coordinates {
  lat: number;
  lon: number;
}

const EARTH_RADIUS_KM = 6371;

export function haversineKm(a: Coordinates, b: Coordinates): number {
  const toRad = (deg: number): number => (deg * Math.PI) / 180;
  const dLat = toRad(b.lat - a.lat);
  const dLon = toRad(b.lon - a.lon);
  const h =
    Math.sin(dLat / 2) ** 2 + Math.cos(toRad(a.lat)) * Math.cos(toRad(b.lat)) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_KM * Math.asin(Math.min(1, Math.sqrt(h)));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number | undefined {
  const parsed = typeof value === 'string' ? Number.parseFloat(value) : value;
  return typeof parsed === 'number' && Number.isFinite(parsed) ? parsed : undefined;
}

function tag(tags: Record<string, unknown>, key: string): string | undefined {
  const value = tags[key];
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

function formatAddress(tags: Record<string, unknown>): string | undefined {
  const street = [tag(tags, 'addr:housenumber'), tag(tags, 'addr:street')].filter(Boolean).join(' ');
  const parts = [street, tag(tags, 'addr:city'), tag(tags, 'addr:postcode')].filter(
    (part): part is string => typeof part === 'string' && part.length > 0
  );
  return parts.length > 0 ? parts.join(', ') : tag(tags, 'addr:full');
}

export class OpenStreetMapHospitalDirectory implements HospitalDirectory {
  private readonly nominatimUrl: string;
  private readonly overpassUrl: string;
  private readonly userAgent: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenStreetMapDirectoryOptions = {}) {
    this.nominatimUrl = options.nominatimUrl ?? 'https://nominatim.openstreetmap.org';
    this.overpassUrl = options.overpassUrl ?? 'https://overpass-api.de/api/interpreter';
    this.userAgent = options.userAgent ?? 'medassist-rag/0.1';
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async search(query: HospitalQuery, signal?: AbortSignal): Promise<HospitalSearchResult> {
    const place = await this.geocode(query.location, signal);
    const elements = await this.queryHospitals(place, query.radiusKm, signal);

    const hospitals: Hospital[] = [];
    for (const element of elements) {
      if (!isRecord(element) || !isRecord(element.tags)) continue;
      const center = isRecord(element.center) ? element.center : element;
      const lat = toNumber(center.lat);
      const lon = toNumber(center.lon);
      const name = tag(element.tags, 'name');
      if (lat === undefined || lon === undefined || !name) continue;

      const emergency = tag(element.tags, 'emergency') === 'yes';
      if (query.emergencyOnly && !emergency) continue;

      const address = formatAddress(element.tags);
      const phone = tag(element.tags, 'phone') ?? tag(element.tags, 'contact:phone');
      hospitals.push({
        name,
        ...(address ? { address } : {}),
        ...(phone ? { phone } : {}),
        distanceKm: Math.round(haversineKm(place, { lat, lon }) * 10) / 10,
        emergency,
      });
    }

    hospitals.sort((a, b) => a.distanceKm - b.distanceKm || a.name.localeCompare(b.name));
    return { location: place.displayName, hospitals: hospitals.slice(0, query.limit) };
  }

  private async geocode(location: string, signal?: AbortSignal): Promise<Coordinates & { displayName: string }> {
    const params = new URLSearchParams({ q: location, format: 'json', limit: '1' });
    const response = await this.fetchImpl(`${this.nominatimUrl}/search?${params.toString()}`, {
      headers: { 'User-Agent': this.userAgent, Accept: 'application/json' },
      signal,
    });
    if (!response.ok) {
      throw new Error(`Geocoding failed with HTTP ${response.status}`);
    }

    const data: unknown = await response.json();
    const first: unknown = Array.isArray(data) ? data[0] : undefined;
    if (!isRecord(first)) {
      throw new LocationNotFoundError(location);
    }
    const lat = toNumber(first.lat);
    const lon = toNumber(first.lon);
    if (lat === undefined || lon === undefined) {
      throw new LocationNotFoundError(location);
    }
    return { lat, lon, displayName: typeof first.display_name === 'string' ? first.display_name : location };
  }

  private async queryHospitals(place: Coordinates, radiusKm: number, signal?: AbortSignal): Promise<unknown[]> {
    const radius = Math.round(radiusKm * 1000);
    const around = `(around:${radius},${place.lat},${place.lon})`;
    const query =
      `[out:json][timeout:25];(` +
      `node["amenity"="hospital"]${around};` +
      `way["amenity"="hospital"]${around};` +
      `relation["amenity"="hospital"]${around};` +
      `);out center tags;`;

    const response = await this.fetchImpl(this.overpassUrl, {
      method: 'POST',
      headers: { 'User-Agent': this.userAgent, 'Content-Type': 'application/x-www-form-urlencoded' },
      body: new URLSearchParams({ data: query }).toString(),
      signal,
    });
    if (!response.ok) {
      throw new Error(`Hospital search failed with HTTP ${response.status}`);
    }

    const data: unknown = await response.json();
    return isRecord(data) && Array.isArray(data.elements) ? data.elements : [];
  }
}
