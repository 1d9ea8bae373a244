import request from 'supertest';
import { createApp } from '../../src/app.js';
import { fakeDb } from '../helpers/fakeSupabase.js';
import { bearer } from '../helpers/auth.js';

vi.mock('../../src/supabase.js', async () => {
  const { fakeDb } = await import('../helpers/fakeSupabase.js');
  return { supabase: fakeDb.client() };
});

const app = createApp();

function seedWorld() {
  const swimmer = fakeDb.seed('swimmers', {
    first_name: 'Maya',
    last_name: 'Lindqvist',
    date_of_birth: '2012-06-15',
    gender: 'F',
  });
  const event = fakeDb.seed('events', { stroke: 'freestyle', distance: 200, course: 'scy' });
  const meet = fakeDb.seed('meets', {
    name: 'Winter Invite',
    location: 'Aquatic Center',
    city: 'Fresno',
    start_date: '2024-12-06',
    course: 'scy',
    sanctioning_body: 'USA Swimming',
    meet_type: 'invitational',
  });
  const team = fakeDb.seed('teams', { name: 'Lakeside Aquatics', team_type: 'club', sanctioning_body: 'USA Swimming', lsc: 'PC' });
  return { swimmer, event, meet, team };
}

describe('swim times routes', () => {
  beforeEach(() => {
    fakeDb.reset();
  });

  describe('POST /', () => {
    it('records a swim with splits given as text', async () => {
      const { swimmer, event, meet, team } = seedWorld();

      const response = await request(app)
        .post('/api/v1/swim-times')
        .set('Authorization', bearer('coach'))
        .send({
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: meet.id,
          team_id: team.id,
          time_formatted: '2:05.40',
          swim_date: '2024-12-07',
          round: 'finals',
          lane: 4,
          splits: '50:29.10; 100:1:01.02; 150:1:33.30',
        });

      expect(response.status).toBe(201);
      expect(response.body.time_centiseconds).toBe(12540);
      expect(response.body.time_formatted).toBe('2:05.40');
      expect(response.body.official).toBe(true);
      expect(
        response.body.splits.map((split: { distance: number; interval_formatted: string }) => [
          split.distance,
          split.interval_formatted,
        ]),
      ).toEqual([
        [50, '29.10'],
        [100, '31.92'],
        [150, '32.28'],
      ]);
      expect(fakeDb.rows('splits')).toHaveLength(3);
    });

    it('rejects splits slower than the final time', async () => {
      const { swimmer, event, meet, team } = seedWorld();

      const response = await request(app)
        .post('/api/v1/swim-times')
        .set('Authorization', bearer('coach'))
        .send({
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: meet.id,
          team_id: team.id,
          time_centiseconds: 12540,
          swim_date: '2024-12-07',
          splits: [{ distance: 150, time_centiseconds: 12600 }],
        });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ error: 'Split at 150 (2:06.00) must be less than final time (2:05.40)' });
      expect(fakeDb.rows('swim_times')).toHaveLength(0);
    });

    it('removes the swim when its splits cannot be saved', async () => {
      const { swimmer, event, meet, team } = seedWorld();
      fakeDb.failNext('splits');

      const response = await request(app)
        .post('/api/v1/swim-times')
        .set('Authorization', bearer('coach'))
        .send({
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: meet.id,
          team_id: team.id,
          time_centiseconds: 12540,
          swim_date: '2024-12-07',
          splits: [{ distance: 100, time_centiseconds: 6102 }],
        });

      expect(response.status).toBe(500);
      expect(response.body.error).toBe('Failed to save splits');
      expect(fakeDb.rows('swim_times')).toHaveLength(0);
      expect(fakeDb.rows('splits')).toHaveLength(0);
    });

    it('rejects an out-of-range lane', async () => {
      const { swimmer, event, meet, team } = seedWorld();

      const response = await request(app)
        .post('/api/v1/swim-times')
        .set('Authorization', bearer('admin'))
        .send({
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: meet.id,
          team_id: team.id,
          time_centiseconds: 12540,
          swim_date: '2024-12-07',
          lane: 11,
        });

      expect(response.status).toBe(400);
      expect(response.body.details[0].message).toBe('Lane must be between 1 and 10');
    });

    it('requires an existing meet', async () => {
      const { swimmer, event, team } = seedWorld();

      const response = await request(app)
        .post('/api/v1/swim-times')
        .set('Authorization', bearer('admin'))
        .send({
          swimmer_id: swimmer.id,
          event_id: event.id,
          meet_id: 'missing-meet',
          team_id: team.id,
          time_centiseconds: 12540,
          swim_date: '2024-12-07',
        });

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ error: 'Meet not found' });
    });

    it('is closed to fans', async () => {
      const response = await request(app).post('/api/v1/swim-times').set('Authorization', bearer('fan')).send({});
      expect(response.status).toBe(403);
    });
  });

  it('lists official swims fastest first', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const base = { swimmer_id: swimmer.id, event_id: event.id, meet_id: meet.id, team_id: team.id, swim_date: '2024-12-07' };
    fakeDb.seed('swim_times', { ...base, time_centiseconds: 12700 });
    fakeDb.seed('swim_times', { ...base, time_centiseconds: 12540 });
    fakeDb.seed('swim_times', { ...base, time_centiseconds: 12400, dq: true });
    fakeDb.seed('swim_times', { ...base, time_centiseconds: 12300, official: false });

    const response = await request(app)
      .get(`/api/v1/swim-times?swimmer_id=${swimmer.id}`)
      .set('Authorization', bearer('fan'));
    expect(response.body.map((swim: { time_centiseconds: number }) => swim.time_centiseconds)).toEqual([12540, 12700]);

    const everything = await request(app)
      .get(`/api/v1/swim-times?swimmer_id=${swimmer.id}&official_only=false&exclude_dq=false`)
      .set('Authorization', bearer('fan'));
    expect(everything.body).toHaveLength(4);
  });

  it('compares a swim with the personal best', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const base = { swimmer_id: swimmer.id, event_id: event.id, meet_id: meet.id, team_id: team.id };
    fakeDb.seed('swim_times', { ...base, time_centiseconds: 12400, swim_date: '2024-11-01' });
    const latest = fakeDb.seed('swim_times', { ...base, time_centiseconds: 12540, swim_date: '2024-12-07' });

    const response = await request(app)
      .get(`/api/v1/swim-times/analysis/${latest.id}`)
      .set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(response.body.is_personal_best).toBe(false);
    expect(response.body.personal_best.time_formatted).toBe('2:04.00');
    expect(response.body.time_off_pb).toBeCloseTo(1.4, 5);
  });

  it('scores a swim against the standards for the swimmer age on the swim date', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const swim = fakeDb.seed('swim_times', {
      swimmer_id: swimmer.id,
      event_id: event.id,
      meet_id: meet.id,
      team_id: team.id,
      time_centiseconds: 12540,
      swim_date: '2024-12-07',
    });
    const standard = {
      event_id: event.id,
      gender: 'F',
      standard_name: 'Motivational',
      sanctioning_body: 'USA Swimming',
      effective_year: 2025,
    };
    fakeDb.seed('time_standards', { ...standard, age_group: '11-12', cut_level: 'BB', time_centiseconds: 13000 });
    fakeDb.seed('time_standards', { ...standard, age_group: '11-12', cut_level: 'A', time_centiseconds: 12100 });
    fakeDb.seed('time_standards', { ...standard, age_group: '13-14', cut_level: 'A', time_centiseconds: 11800 });

    const response = await request(app)
      .get(`/api/v1/swim-times/${swim.id}/standards`)
      .set('Authorization', bearer('fan'));

    expect(response.body.age).toBe(12);
    expect(response.body.best_achieved.standard.cut_level).toBe('BB');
    expect(response.body.next_standard.standard.cut_level).toBe('A');
    expect(response.body.next_standard.margin_centiseconds).toBe(440);
    expect(response.body.split_standards).toEqual([]);
  });

  it('checks splits against the cuts of the shorter event', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const free50 = fakeDb.seed('events', { stroke: 'freestyle', distance: 50, course: 'scy' });
    const free100 = fakeDb.seed('events', { stroke: 'freestyle', distance: 100, course: 'scy' });
    const swim = fakeDb.seed('swim_times', {
      swimmer_id: swimmer.id,
      event_id: event.id,
      meet_id: meet.id,
      team_id: team.id,
      time_centiseconds: 12540,
      swim_date: '2024-12-07',
    });
    fakeDb.seed('splits', { swim_time_id: swim.id, distance: 50, time_centiseconds: 2900 });
    fakeDb.seed('splits', { swim_time_id: swim.id, distance: 100, time_centiseconds: 6050 });
    fakeDb.seed('splits', { swim_time_id: swim.id, distance: 150, time_centiseconds: 9330 });
    const standard = {
      event_id: free100.id,
      gender: 'F',
      age_group: '11-12',
      standard_name: 'Motivational',
      sanctioning_body: 'USA Swimming',
      effective_year: 2025,
    };
    fakeDb.seed('time_standards', { ...standard, cut_level: 'A', time_centiseconds: 6100 });
    fakeDb.seed('time_standards', { ...standard, cut_level: 'AA', time_centiseconds: 5900 });

    const response = await request(app)
      .get(`/api/v1/swim-times/${swim.id}/standards`)
      .set('Authorization', bearer('fan'));

    expect(response.status).toBe(200);
    expect(
      response.body.split_standards.map(
        (entry: { distance: number; event: { id: string }; achieved: { standard: { cut_level: string } }[] }) => [
          entry.distance,
          entry.event.id,
          entry.achieved.map((result) => result.standard.cut_level),
        ],
      ),
    ).toEqual([
      [50, free50.id, []],
      [100, free100.id, ['A']],
    ]);
    expect(response.body.split_standards[1]).toMatchObject({
      time_formatted: '1:00.50',
      event: { label: '100 Free SCY' },
      achieved: [{ time_formatted: '1:01.00' }],
    });

    fakeDb.rows('swim_times')[0].dq = true;
    const disqualified = await request(app)
      .get(`/api/v1/swim-times/${swim.id}/standards`)
      .set('Authorization', bearer('fan'));
    expect(disqualified.body.split_standards[1].achieved).toEqual([]);
  });

  it('replaces splits when the time changes on update', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const swim = fakeDb.seed('swim_times', {
      swimmer_id: swimmer.id,
      event_id: event.id,
      meet_id: meet.id,
      team_id: team.id,
      time_centiseconds: 12540,
      swim_date: '2024-12-07',
    });
    fakeDb.seed('splits', { swim_time_id: swim.id, distance: 150, time_centiseconds: 9330 });

    const tooFast = await request(app)
      .patch(`/api/v1/swim-times/${swim.id}`)
      .set('Authorization', bearer('coach'))
      .send({ time_formatted: '1:30.00' });
    expect(tooFast.status).toBe(400);
    expect(tooFast.body).toEqual({ error: 'Split at 150 (1:33.30) must be less than final time (1:30.00)' });

    const updated = await request(app)
      .patch(`/api/v1/swim-times/${swim.id}`)
      .set('Authorization', bearer('coach'))
      .send({ time_formatted: '2:04.99', splits: [{ distance: 100, time_formatted: '1:00.50' }] });
    expect(updated.status).toBe(200);
    expect(updated.body.time_centiseconds).toBe(12499);
    expect(updated.body.splits.map((split: { distance: number }) => split.distance)).toEqual([100]);
  });

  it('deletes a swim with its splits', async () => {
    const { swimmer, event, meet, team } = seedWorld();
    const swim = fakeDb.seed('swim_times', {
      swimmer_id: swimmer.id,
      event_id: event.id,
      meet_id: meet.id,
      team_id: team.id,
      time_centiseconds: 12540,
      swim_date: '2024-12-07',
    });
    fakeDb.seed('splits', { swim_time_id: swim.id, distance: 100, time_centiseconds: 6102 });

    const response = await request(app).delete(`/api/v1/swim-times/${swim.id}`).set('Authorization', bearer('coach'));
    expect(response.status).toBe(204);
    expect(fakeDb.rows('swim_times')).toHaveLength(0);
    expect(fakeDb.rows('splits')).toHaveLength(0);
  });
});
