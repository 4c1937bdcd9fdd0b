/**
 * Response fixtures for the mock IRI API
 */

export const mockFacility = {
  id: 'facility-1',
  name: 'Test Facility',
  short_name: 'TF',
  description: 'Facility used by the client tests',
};

export const mockSite = {
  id: 'site-1',
  name: 'Main Campus',
  short_name: 'main',
  location_id: 'loc-1',
};

export const mockSitesList = [
  mockSite,
  {
    id: 'site-2',
    name: 'Remote Annex',
    short_name: 'annex',
    location_id: 'loc-2',
  },
];

export const mockIncidents = [
  { id: 'inc-1', status: 'active', description: 'Scratch filesystem degraded' },
  { id: 'inc-2', status: 'resolved', description: 'Login node maintenance' },
];

export const mockJob = {
  id: 'job-42',
  status: 'queued',
  resource_id: 'cpu',
};
