import { describe, it, expect, beforeEach } from 'vitest';
import { SessionService } from './session.service';

describe('SessionService', () => {
  let session: SessionService;

  beforeEach(() => {
    session = new SessionService();
  });

  it('records each distinct query once, in order', () => {
    session.recordQuery('diabetes');
    session.recordQuery('chest pain');
    session.recordQuery('diabetes');

    expect(session.getHistory()).toEqual(['diabetes', 'chest pain']);
    expect(session.getHistoryCount()).toBe(2);
  });

  it('returns the most recent queries up to a limit', () => {
    ['a', 'b', 'c', 'd'].forEach((q) => session.recordQuery(q));

    expect(session.getHistory(2)).toEqual(['c', 'd']);
    expect(session.getHistory(0)).toEqual([]);
  });

  it('clears history', () => {
    session.recordQuery('fever');
    session.clearHistory();
    expect(session.getHistory()).toEqual([]);
  });

  it('starts with an empty profile', () => {
    expect(session.getProfile()).toEqual({
      age: null,
      gender: null,
      conditions: [],
      medications: [],
      allergies: [],
    });
  });

  it('normalises profile updates', () => {
    const profile = session.updateProfile({
      age: 0,
      gender: '',
      medications: [' Warfarin ', '', '  '],
      allergies: ['Penicillin'],
    });

    expect(profile).toEqual({
      age: null,
      gender: null,
      conditions: [],
      medications: ['Warfarin'],
      allergies: ['Penicillin'],
    });
  });

  it('keeps fields that an update leaves out', () => {
    session.updateProfile({ age: 52, conditions: ['Hypertension'] });
    const profile = session.updateProfile({ gender: 'Female' });

    expect(profile).toEqual({
      age: 52,
      gender: 'Female',
      conditions: ['Hypertension'],
      medications: [],
      allergies: [],
    });
  });

  it('hands out copies of the stored profile', () => {
    session.updateProfile({ medications: ['Metformin'] });
    session.getProfile().medications.push('Aspirin');

    expect(session.toPatientContext().medications).toEqual(['Metformin']);
  });
});
