import request from 'supertest';
import { createApp } from '../../src/app.js';
import { fakeDb } from '../helpers/fakeSupabase.js';
import { bearer } from '../helpers/auth.js';

vi.mock('../../src/supabase.js', async () => {
  const { fakeDb } = await import('../helpers/fakeSupabase.js');
  return { supabase: fakeDb.client() };
});

const app = createApp();

function seedSwimmer(overrides: Record<string, unknown> = {}) {
  return fakeDb.seed('swimmers', {
    first_name: 'Maya',
    last_name: 'Lindqvist',
    date_of_birth: '2012-06-15',
    gender: 'F',
    ...overrides,
  });
}

function seedTeam(name: string) {
  return fakeDb.seed('teams', { name, team_type: 'club', sanctioning_body: 'USA Swimming', lsc: 'PC' });
}

describe('swimmers routes', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  it('creates a swimmer as coach', async () => {
    const response = await request(app)
      .post('/api/v1/swimmers')
      .set('Authorization', bearer('coach'))
      .send({ first_name: 'Maya', last_name: 'Lindqvist', date_of_birth: '2012-06-15', gender: 'F' });

    expect(response.status).toBe(201);
    expect(response.body.id).toBe('swimmers_1');
    expect(response.body.full_name).toBe('Maya Lindqvist');
    expect(response.body.usa_swimming_id).toBeNull();
  });

  it('forbids fans from creating swimmers', async () => {
    const response = await request(app)
      .post('/api/v1/swimmers')
      .set('Authorization', bearer('fan'))
      .send({ first_name: 'Maya', last_name: 'Lindqvist', date_of_birth: '2012-06-15', gender: 'F' });

    expect(response.status).toBe(403);
    expect(response.body).toEqual({ error: 'Requires one of: admin, coach' });
  });

  it('rejects a duplicate USA Swimming id', async () => {
    seedSwimmer({ usa_swimming_id: 'ABC123' });
    const response = await request(app)
      .post('/api/v1/swimmers')
      .set('Authorization', bearer('admin'))
      .send({ first_name: 'Ada', last_name: 'Park', date_of_birth: '2011-01-01', gender: 'F', usa_swimming_id: 'ABC123' });

    expect(response.status).toBe(409);
    expect(response.body).toEqual({ error: "A swimmer with USA Swimming ID 'ABC123' already exists" });
  });

  it('rejects malformed dates', async () => {
    const response = await request(app)
      .post('/api/v1/swimmers')
      .set('Authorization', bearer('admin'))
      .send({ first_name: 'Ada', last_name: 'Park', date_of_birth: '01/01/2011', gender: 'F' });

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('Invalid request');
  });

  it('rejects a day past the end of the month', async () => {
    const response = await request(app)
      .post('/api/v1/swimmers')
      .set('Authorization', bearer('admin'))
      .send({ first_name: 'Ada', last_name: 'Park', date_of_birth: '2024-02-31', gender: 'F' });

    expect(response.status).toBe(400);
    expect(response.body.details).toEqual([
      expect.objectContaining({ path: ['date_of_birth'], message: 'Not a calendar date' }),
    ]);
    expect(fakeDb.rows('swimmers')).toEqual([]);
  });

  it('searches first and last names and orders by last name', async () => {
    seedSwimmer();
    seedSwimmer({ first_name: 'Jonas', last_name: 'Mayfield', gender: 'M' });
    seedSwimmer({ first_name: 'Ada', last_name: 'Park' });

    const response = await request(app).get('/api/v1/swimmers?name=may').set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(response.body.map((swimmer: { full_name: string }) => swimmer.full_name)).toEqual([
      'Maya Lindqvist',
      'Jonas Mayfield',
    ]);

    const girls = await request(app).get('/api/v1/swimmers?gender=F').set('Authorization', bearer('fan'));
    expect(girls.body.map((swimmer: { last_name: string }) => swimmer.last_name)).toEqual(['Lindqvist', 'Park']);
  });

  it('matches a full name in either order', async () => {
    seedSwimmer({ first_name: 'Ana', last_name: 'Diaz' });
    seedSwimmer({ first_name: 'Ana', last_name: 'Moreno' });
    seedSwimmer({ first_name: 'Luis', last_name: 'Diaz', gender: 'M' });

    const forward = await request(app)
      .get('/api/v1/swimmers')
      .query({ name: 'Ana Diaz' })
      .set('Authorization', bearer('fan'));
    expect(forward.status).toBe(200);
    expect(forward.body.map((swimmer: { id: string }) => swimmer.id)).toEqual(['swimmers_1']);

    const reversed = await request(app)
      .get(`/api/v1/swimmers?name=${encodeURIComponent('diaz, ana')}`)
      .set('Authorization', bearer('fan'));
    expect(reversed.body.map((swimmer: { id: string }) => swimmer.id)).toEqual(['swimmers_1']);
  });

  it('treats underscores in a name search literally', async () => {
    seedSwimmer({ first_name: 'Ana', last_name: 'Diaz' });

    const response = await request(app).get('/api/v1/swimmers?name=Di_z').set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(response.body).toEqual([]);
  });

  describe('team memberships', () => {
    it('adds, lists and ends a membership', async () => {
      const swimmer = seedSwimmer();
      const team = seedTeam('Lakeside Aquatics');

      const added = await request(app)
        .post(`/api/v1/swimmers/${swimmer.id}/teams`)
        .set('Authorization', bearer('coach'))
        .send({ team_id: team.id, start_date: '2024-09-01' });
      expect(added.status).toBe(201);
      expect(added.body).toMatchObject({
        swimmer_id: swimmer.id,
        team_id: team.id,
        start_date: '2024-09-01',
        end_date: null,
        team_name: 'Lakeside Aquatics',
        is_current: true,
      });

      const again = await request(app)
        .post(`/api/v1/swimmers/${swimmer.id}/teams`)
        .set('Authorization', bearer('coach'))
        .send({ team_id: team.id });
      expect(again.status).toBe(409);
      expect(again.body).toEqual({ error: "Swimmer is already a current member of 'Lakeside Aquatics'" });

      const ended = await request(app)
        .delete(`/api/v1/swimmers/${swimmer.id}/teams/${team.id}?end_date=2025-01-31`)
        .set('Authorization', bearer('coach'));
      expect(ended.status).toBe(200);
      expect(ended.body.end_date).toBe('2025-01-31');
      expect(ended.body.is_current).toBe(false);

      const current = await request(app).get(`/api/v1/swimmers/${swimmer.id}/teams`).set('Authorization', bearer('fan'));
      expect(current.status).toBe(200);
      expect(current.body).toEqual([]);

      const all = await request(app)
        .get(`/api/v1/swimmers/${swimmer.id}/teams?current_only=false`)
        .set('Authorization', bearer('fan'));
      expect(all.body).toHaveLength(1);
      expect(all.body[0].team_name).toBe('Lakeside Aquatics');
    });

    it('hides ended memberships unless asked for all', async () => {
      const swimmer = seedSwimmer();
      const team = seedTeam('Lakeside Aquatics');
      fakeDb.seed('swimmer_teams', {
        swimmer_id: swimmer.id,
        team_id: team.id,
        start_date: '2014-09-01',
        end_date: '2016-01-01',
      });

      const current = await request(app).get(`/api/v1/swimmers/${swimmer.id}/teams`).set('Authorization', bearer('fan'));
      expect(current.status).toBe(200);
      expect(current.body).toEqual([]);

      const all = await request(app)
        .get(`/api/v1/swimmers/${swimmer.id}/teams?current_only=false`)
        .set('Authorization', bearer('fan'));
      expect(all.body).toHaveLength(1);
      expect(all.body[0]).toMatchObject({ end_date: '2016-01-01', is_current: false });
    });

    it('reports a missing membership', async () => {
      const swimmer = seedSwimmer();
      const team = seedTeam('Bayside Swim Club');

      const response = await request(app)
        .delete(`/api/v1/swimmers/${swimmer.id}/teams/${team.id}`)
        .set('Authorization', bearer('admin'));
      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: "Swimmer is not a current member of 'Bayside Swim Club'" });
    });
  });

  it('lists personal bests sorted by event label', async () => {
    const swimmer = seedSwimmer();
    const free = fakeDb.seed('events', { stroke: 'freestyle', distance: 100, course: 'scy' });
    const back = fakeDb.seed('events', { stroke: 'backstroke', distance: 100, course: 'scy' });
    const base = { swimmer_id: swimmer.id, meet_id: 'meet', team_id: 'team' };
    fakeDb.seed('swim_times', { ...base, event_id: free.id, time_centiseconds: 5912, swim_date: '2024-11-02' });
    fakeDb.seed('swim_times', { ...base, event_id: free.id, time_centiseconds: 5840, swim_date: '2025-01-18' });
    fakeDb.seed('swim_times', { ...base, event_id: free.id, time_centiseconds: 5700, swim_date: '2025-02-01', dq: true });
    fakeDb.seed('swim_times', { ...base, event_id: back.id, time_centiseconds: 6655, swim_date: '2025-01-18' });

    const response = await request(app)
      .get(`/api/v1/swimmers/${swimmer.id}/personal-bests`)
      .set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(
      response.body.map((best: { event: { label: string }; time_formatted: string }) => [best.event.label, best.time_formatted]),
    ).toEqual([
      ['100 Back SCY', '1:06.55'],
      ['100 Free SCY', '58.40'],
    ]);
  });

  it('reports qualifications as of a date', async () => {
    const swimmer = seedSwimmer();
    const free = fakeDb.seed('events', { stroke: 'freestyle', distance: 100, course: 'scy' });
    const standard = {
      event_id: free.id,
      gender: 'F',
      standard_name: 'Winter Juniors',
      sanctioning_body: 'USA Swimming',
      effective_year: 2025,
    };
    fakeDb.seed('time_standards', { ...standard, cut_level: 'A', time_centiseconds: 6019 });
    fakeDb.seed('time_standards', { ...standard, cut_level: 'AA', time_centiseconds: 5779 });
    fakeDb.seed('time_standards', { ...standard, gender: 'M', cut_level: 'A', time_centiseconds: 5500 });
    fakeDb.seed('swim_times', {
      swimmer_id: swimmer.id,
      event_id: free.id,
      meet_id: 'meet',
      team_id: 'team',
      time_centiseconds: 5912,
      swim_date: '2025-01-18',
    });

    const response = await request(app)
      .get(`/api/v1/swimmers/${swimmer.id}/qualifications?as_of=2025-03-01&sanctioning_body=usa%20swimming`)
      .set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(response.body.as_of).toBe('2025-03-01');
    expect(response.body.age).toBe(12);
    expect(response.body.swimmer.age_group).toBe('11-12');
    expect(response.body.groups).toHaveLength(1);
    expect(response.body.groups[0].equivalence_key).toBe('freestyle-100');
    expect(
      response.body.groups[0].rows.map((row: { standard: { cut_level: string }; achieved: boolean; margin_centiseconds: number }) => [
        row.standard.cut_level,
        row.achieved,
        row.margin_centiseconds,
      ]),
    ).toEqual([
      ['AA', false, 133],
      ['A', true, -107],
    ]);
  });

  it('returns 404 for an unknown swimmer', async () => {
    const response = await request(app).get('/api/v1/swimmers/nobody').set('Authorization', bearer('fan'));
    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Swimmer not found' });
  });
});
