/**
 * Unit Tests for Matching Routes
 * Drives the full Express app with an in-memory profile source
 */

import { describe, test, expect } from '@jest/globals';
import request from 'supertest';
import { createApp } from '../../../server/app';
import { loadConfig } from '../../../server/config/unified-config';
import { InMemoryProfileSource, type ProfileSource } from '../../../server/services/profile-dataset';
import { ProfileDatasetUnavailableError } from '../../../shared/errors';
import { makeProfile, testDescriptions, testProfiles } from '../../fixtures/test-data';

const config = loadConfig({ NODE_ENV: 'test', DEFAULT_TOP_N: '2', MAX_TOP_N: '3' });

function buildApp(profileSource: ProfileSource = new InMemoryProfileSource(testProfiles)) {
  return createApp({ config, profileSource });
}

describe('Matching Routes', () => {
  describe('POST /api/v1/match', () => {
    test('should rank profiles and return the default top N', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack });

      expect(response.status).toBe(200);
      expect(response.body.success).toBe(true);
      expect(response.body.data.total).toBe(3);
      expect(response.body.data.returned).toBe(2);
      expect(response.body.data.results).toEqual([
        {
          name: 'Carla Mendes',
          url: 'https://profiles.example.com/carla',
          score: 6,
          justification:
            'Compatible skills: full stack, python, react, sql. ' +
            'Experience: 4 years (required: 3) - meets requirement. ' +
            'Education: mestrado (required: superior completo) - meets requirement.',
        },
        {
          name: 'Ana Souza',
          url: 'https://profiles.example.com/ana',
          score: 4,
          justification:
            'Compatible skills: python, sql. ' +
            'Experience: 5 years (required: 3) - meets requirement. ' +
            'Education: superior completo (required: superior completo) - meets requirement.',
        },
      ]);
      expect(response.body.data).not.toHaveProperty('requirements');
    });

    test('should accept the description from a form body under descricao', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .type('form')
        .send({ descricao: testDescriptions.fullStack, limit: '1' });

      expect(response.status).toBe(200);
      expect(response.body.data.results.map((item: { name: string }) => item.name)).toEqual(['Carla Mendes']);
    });

    test('should prefer body fields over the query string', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match?description=Vaga%20PHP&debug=true')
        .send({ vaga: 'Vaga Java' });

      expect(response.status).toBe(200);
      expect(response.body.data.requirements.skills).toEqual(['java']);
    });

    test('should include the parsed requirements in debug mode', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack, debug: true });

      expect(response.body.data.requirements).toEqual({
        skills: ['full stack', 'python', 'react', 'sql'],
        experienceYears: 3,
        education: 'superior completo',
      });
    });

    test('should clamp the limit to the configured maximum', async () => {
      const profiles = [1, 2, 3, 4, 5].map((n) => makeProfile({ name: `P${n}` }));
      const response = await request(buildApp(new InMemoryProfileSource(profiles)))
        .post('/api/v1/match')
        .send({ description: 'Python', limit: 100 });

      expect(response.body.data.total).toBe(5);
      expect(response.body.data.returned).toBe(3);
    });

    test('should fall back to the default limit for invalid values', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack, limit: -4 });

      expect(response.body.data.returned).toBe(2);
    });

    test('should truncate a fractional limit', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack, limit: '1.9' });

      expect(response.body.data.returned).toBe(1);
    });

    test('should fall back to top when limit is not a number', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match?limit=abc&top=3')
        .send({ description: testDescriptions.fullStack });

      expect(response.body.data.returned).toBe(3);
    });

    test('should reject a missing description with 400', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .send({ description: '   ' });

      expect(response.status).toBe(400);
      expect(response.body).toMatchObject({
        success: false,
        error: 'MISSING_DESCRIPTION',
        message: 'A job description is required',
        details: { acceptedFields: ['description', 'descricao', 'vaga'] },
      });
    });

    test('should answer 503 when the dataset is unavailable', async () => {
      const source = new InMemoryProfileSource(
        ProfileDatasetUnavailableError.invalidJson('profiles.json', new Error('Unexpected end of JSON input'))
      );

      const response = await request(buildApp(source))
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack });

      expect(response.status).toBe(503);
      expect(response.body).toMatchObject({
        success: false,
        error: 'PROFILE_DATASET_UNAVAILABLE',
        message: 'Profile dataset unavailable (profiles.json): file is not valid JSON',
      });
    });

    test('should answer 200 with no results for an empty dataset', async () => {
      const response = await request(buildApp(new InMemoryProfileSource([])))
        .post('/api/v1/match')
        .send({ description: testDescriptions.fullStack });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ total: 0, returned: 0, results: [] });
    });

    test('should answer 400 for a malformed JSON body', async () => {
      const response = await request(buildApp())
        .post('/api/v1/match')
        .set('Content-Type', 'application/json')
        .send('{"description": ');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('INVALID_REQUEST_BODY');
    });
  });

  describe('GET /api/match', () => {
    test('should read the description from the query string on the legacy path', async () => {
      const response = await request(buildApp())
        .get('/api/match')
        .query({ vaga: testDescriptions.fullStack, top: '3' });

      expect(response.status).toBe(200);
      expect(response.body.data.results.map((item: { score: number }) => item.score)).toEqual([6, 4, 1]);
    });
  });

  describe('GET /api/v1/requirements', () => {
    test('should return the extracted requirements alone', async () => {
      const response = await request(buildApp())
        .get('/api/v1/requirements')
        .query({ description: testDescriptions.dataEngineer });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({
        skills: ['aws', 'python'],
        experienceYears: 5,
        education: 'pos-graduacao',
      });
    });

    test('should reject a request without description', async () => {
      const response = await request(buildApp()).get('/api/v1/requirements');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('MISSING_DESCRIPTION');
    });
  });

  describe('Health and fallbacks', () => {
    test('should not trust forwarding proxies', () => {
      expect(buildApp().get('trust proxy')).toBe(false);
    });

    test('should report health', async () => {
      const response = await request(buildApp()).get('/api/v1/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ok');
    });

    test('should answer unknown routes with 404', async () => {
      const response = await request(buildApp()).get('/api/v1/unknown');

      expect(response.status).toBe(404);
      expect(response.body).toMatchObject({ success: false, error: 'NOT_FOUND' });
    });
  });
});
