import { FindHospitalsTool } from '../../../../src/infra/tools/implementations/find-hospitals-tool.js';
import {
  LocationNotFoundError,
  OpenStreetMapHospitalDirectory,
  haversineKm,
} from '../../../../src/infra/tools/implementations/hospital-directory.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const PUNE = [{ lat: '18.5200', lon: '73.8500', display_name: 'Pune, Maharashtra, India' }];

const ELEMENTS = {
  elements: [
    {
      type: 'node',
      lat: 18.53,
      lon: 73.85,
      tags: { name: 'Ruby Hall Clinic', emergency: 'yes', phone: '+91 20 0000 0000', 'addr:street': 'Sassoon Road', 'addr:city': 'Pune' },
    },
    { type: 'way', center: { lat: 18.52, lon: 73.85 }, tags: { name: 'City Care Hospital', emergency: 'no' } },
    { type: 'node', lat: 18.52, lon: 73.86, tags: { amenity: 'hospital' } },
  ],
};

function routedFetch(geocode: Response, overpass: Response) {
  return jest.fn(async (input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
    return String(input).includes('/search?') ? geocode : overpass;
  });
}

describe('haversineKm', () => {
  it('should measure great-circle distance', () => {
    expect(haversineKm({ lat: 18.52, lon: 73.85 }, { lat: 18.52, lon: 73.85 })).toBe(0);
    expect(haversineKm({ lat: 18.52, lon: 73.85 }, { lat: 18.53, lon: 73.85 })).toBeCloseTo(1.112, 2);
  });
});

describe('OpenStreetMapHospitalDirectory', () => {
  it('should geocode the place and return named hospitals nearest first', async () => {
    const fetchImpl = routedFetch(jsonResponse(PUNE), jsonResponse(ELEMENTS));
    const directory = new OpenStreetMapHospitalDirectory({
      nominatimUrl: 'https://geo.test',
      overpassUrl: 'https://overpass.test/api',
      fetchImpl,
    });

    const result = await directory.search({ location: 'Pune', radiusKm: 5, limit: 5, emergencyOnly: false });

    expect(result).toEqual({
      location: 'Pune, Maharashtra, India',
      hospitals: [
        { name: 'City Care Hospital', distanceKm: 0, emergency: false },
        {
          name: 'Ruby Hall Clinic',
          address: 'Sassoon Road, Pune',
          phone: '+91 20 0000 0000',
          distanceKm: 1.1,
          emergency: true,
        },
      ],
    });
    expect(String(fetchImpl.mock.calls[0][0])).toBe('https://geo.test/search?q=Pune&format=json&limit=1');
    const overpassInit = fetchImpl.mock.calls[1][1];
    expect(fetchImpl.mock.calls[1][0]).toBe('https://overpass.test/api');
    expect(decodeURIComponent(String(overpassInit?.body))).toContain('node["amenity"="hospital"](around:5000,18.52,73.85);');
  });

  it('should filter to emergency departments and apply the limit', async () => {
    const directory = new OpenStreetMapHospitalDirectory({
      fetchImpl: routedFetch(jsonResponse(PUNE), jsonResponse(ELEMENTS)),
    });

    const emergency = await directory.search({ location: 'Pune', radiusKm: 5, limit: 5, emergencyOnly: true });
    expect(emergency.hospitals.map((hospital) => hospital.name)).toEqual(['Ruby Hall Clinic']);

    const limited = await new OpenStreetMapHospitalDirectory({
      fetchImpl: routedFetch(jsonResponse(PUNE), jsonResponse(ELEMENTS)),
    }).search({ location: 'Pune', radiusKm: 5, limit: 1, emergencyOnly: false });
    expect(limited.hospitals.map((hospital) => hospital.name)).toEqual(['City Care Hospital']);
  });

  it('should report unknown places', async () => {
    const directory = new OpenStreetMapHospitalDirectory({
      fetchImpl: routedFetch(jsonResponse([]), jsonResponse(ELEMENTS)),
    });

    await expect(
      directory.search({ location: 'Atlantis', radiusKm: 5, limit: 5, emergencyOnly: false })
    ).rejects.toEqual(new LocationNotFoundError('Atlantis'));
  });

  it('should surface HTTP failures', async () => {
    const directory = new OpenStreetMapHospitalDirectory({
      fetchImpl: routedFetch(jsonResponse(PUNE), jsonResponse({}, 504)),
    });

    await expect(
      directory.search({ location: 'Pune', radiusKm: 5, limit: 5, emergencyOnly: false })
    ).rejects.toThrow('Hospital search failed with HTTP 504');
  });
});

describe('FindHospitalsTool', () => {
  it('should apply defaults and pass the cancellation signal', async () => {
    const search = jest.fn(async () => ({ location: 'Goa', hospitals: [] }));
    const tool = new FindHospitalsTool({ search });
    const signal = new AbortController().signal;

    await tool.execute({ location: '  Goa ' }, { callId: 'call_1', signal });

    expect(search).toHaveBeenCalledWith({ location: 'Goa', radiusKm: 10, limit: 5, emergencyOnly: false }, signal);
  });

  it('should pass explicit options through', async () => {
    const search = jest.fn(async () => ({ location: 'Goa', hospitals: [] }));
    const tool = new FindHospitalsTool({ search });

    await tool.execute(
      { location: 'Goa', radius_km: 3, limit: 2, emergency_only: true },
      { callId: 'call_1', signal: new AbortController().signal }
    );

    expect(search.mock.calls[0]).toEqual([
      { location: 'Goa', radiusKm: 3, limit: 2, emergencyOnly: true },
      expect.any(AbortSignal),
    ]);
  });
});
