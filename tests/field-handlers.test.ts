import { ApiEvent, createFieldHandlers, parseCreateFieldRequest } from '../src/handlers/field-handlers';
import { UNIT_SQUARE, LUDHIANA_PLOT } from './helpers/fixtures';
import { createTestServices } from './helpers/services';

const CONTEXT = { awsRequestId: 'req-test-1' };

function event(overrides: Partial<ApiEvent> = {}): ApiEvent {
  return {
    body: null,
    path: '/fields',
    httpMethod: 'GET',
    pathParameters: null,
    queryStringParameters: null,
    ...overrides,
  };
}

function setup() {
  const services = createTestServices();
  return { services, handlers: createFieldHandlers(() => services) };
}

describe('field handlers', () => {
  it('creates a field and returns 201 with derived geometry', async () => {
    const { handlers } = setup();

    const response = await handlers.createField(event({
      httpMethod: 'POST',
      body: JSON.stringify({ userId: 'user-1', name: 'Plot', boundary: UNIT_SQUARE, region: 'Punjab' }),
    }), CONTEXT);

    expect(response.statusCode).toBe(201);
    const body = JSON.parse(response.body);
    expect(body.success).toBe(true);
    expect(body.data.centroid).toEqual({ latitude: 0.5, longitude: 0.5 });
    expect(body.data.region).toBe('Punjab');
  });

  it('returns 400 for a malformed body', async () => {
    const { handlers } = setup();

    const response = await handlers.createField(event({ httpMethod: 'POST', body: '{not json' }), CONTEXT);

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error).toEqual({
      message: 'Validation failed',
      details: { validationErrors: ['Request body must be valid JSON'] },
    });
  });

  it('rejects a boundary whose interior ring is too short', async () => {
    const { handlers } = setup();
    const boundary = {
      type: 'Polygon',
      coordinates: [UNIT_SQUARE.coordinates[0], [[0.2, 0.2], [0.3, 0.2], [0.3, 0.3]]],
    };

    const response = await handlers.createField(event({
      httpMethod: 'POST',
      body: JSON.stringify({ userId: 'user-1', name: 'Plot', boundary }),
    }), CONTEXT);

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error.details).toEqual({
      validationErrors: ['Interior ring 1 must have at least 4 positions'],
    });
  });

  it('rejects a boundary whose interior ring is not closed', async () => {
    const { handlers } = setup();
    const boundary = {
      type: 'Polygon',
      coordinates: [UNIT_SQUARE.coordinates[0], [[0.2, 0.2], [0.3, 0.2], [0.3, 0.3], [0.2, 0.3]]],
    };

    const response = await handlers.createField(event({
      httpMethod: 'POST',
      body: JSON.stringify({ userId: 'user-1', name: 'Plot', boundary }),
    }), CONTEXT);

    expect(response.statusCode).toBe(400);
    expect(JSON.parse(response.body).error.details).toEqual({
      validationErrors: ['Interior ring 1 must be closed (first position equals last)'],
    });
  });

  it('accepts a boundary with a closed interior ring', async () => {
    const { handlers } = setup();
    const boundary = {
      type: 'Polygon',
      coordinates: [UNIT_SQUARE.coordinates[0], [[0.2, 0.2], [0.3, 0.2], [0.3, 0.3], [0.2, 0.2]]],
    };

    const response = await handlers.createField(event({
      httpMethod: 'POST',
      body: JSON.stringify({ userId: 'user-1', name: 'Plot', boundary }),
    }), CONTEXT);

    expect(response.statusCode).toBe(201);
  });

  it('returns 404 for an unknown field', async () => {
    const { handlers } = setup();

    const response = await handlers.analyzeField(event({
      httpMethod: 'POST',
      pathParameters: { fieldId: 'field_missing' },
    }), CONTEXT);

    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.body).error.message).toBe('Field not found: field_missing');
  });

  it('runs an analysis and then serves it from history', async () => {
    const { services, handlers } = setup();
    const field = await services.fieldManager.createField({
      userId: 'user-1',
      name: 'Ludhiana wheat',
      boundary: LUDHIANA_PLOT,
      region: 'Punjab',
      cropType: 'wheat',
    });

    const analysis = await handlers.analyzeField(event({
      httpMethod: 'POST',
      pathParameters: { fieldId: field.fieldId },
    }), CONTEXT);
    expect(analysis.statusCode).toBe(200);
    expect(JSON.parse(analysis.body).data.healthStatus).toBe('Good');

    const history = await handlers.fieldHistory(event({
      pathParameters: { fieldId: field.fieldId },
      queryStringParameters: { days: '3' },
    }), CONTEXT);
    expect(history.statusCode).toBe(200);
    const { data } = JSON.parse(history.body);
    expect(data.history.windowDays).toBe(3);
    expect(data.history.entries).toHaveLength(1);
    expect(data.advisoryFeed.advisories.map((entry: { priority: number }) => entry.priority)).toEqual([1, 2]);
  });

  it('returns 500 when the same field is analyzed twice in a day', async () => {
    const { services, handlers } = setup();
    const field = await services.fieldManager.createField({ userId: 'user-1', name: 'Plot', boundary: UNIT_SQUARE });
    const request = event({ httpMethod: 'POST', pathParameters: { fieldId: field.fieldId } });

    expect((await handlers.analyzeField(request, CONTEXT)).statusCode).toBe(200);
    expect((await handlers.analyzeField(request, CONTEXT)).statusCode).toBe(500);
  });

  it('rejects an invalid history window', async () => {
    const { handlers } = setup();

    const response = await handlers.fieldHistory(event({
      pathParameters: { fieldId: 'field-1' },
      queryStringParameters: { days: 'week' },
    }), CONTEXT);

    expect(response.statusCode).toBe(400);
  });
});

describe('parseCreateFieldRequest', () => {
  it('rejects a body without a polygon boundary', () => {
    expect(() => parseCreateFieldRequest({ userId: 'user-1', name: 'Plot', boundary: { type: 'Point', coordinates: [0, 0] } }))
      .toThrow('Boundary must be a GeoJSON Polygon');
  });

  it('keeps only known string attributes', () => {
    expect(parseCreateFieldRequest({ userId: 'user-1', name: 'Plot', boundary: UNIT_SQUARE, region: 7, season: 'rabi' }))
      .toEqual({
        userId: 'user-1',
        name: 'Plot',
        boundary: UNIT_SQUARE,
        region: undefined,
        district: undefined,
        cropType: undefined,
        cropStage: undefined,
        season: 'rabi',
      });
  });
});
