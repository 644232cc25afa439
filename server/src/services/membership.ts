import { randomBytes } from 'node:crypto';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { TeamKind, TeamRow } from '../types.js';
import type { ServiceContext } from './context.js';
import type { UnlockEngine } from './unlockEngine.js';

// No 0, 1, O or I: codes are read aloud and copied off paper.
export const JOIN_CODE_ALPHABET = 'ABCDEFGHJKLMNPQRSTUVWXYZ23456789';
export const JOIN_CODE_LENGTH = 5;

export function generateJoinCode(length = JOIN_CODE_LENGTH) {
  const bytes = randomBytes(length);
  let value = '';
  for (let i = 0; i < length; i += 1) {
    value += JOIN_CODE_ALPHABET[bytes[i] % JOIN_CODE_ALPHABET.length];
  }
  return value;
}

export function teamKind(team: Pick<TeamRow, 'playtester'>): TeamKind {
  return team.playtester ? 'playtester' : 'normal';
}

export interface MembershipDeps extends ServiceContext {
  unlockEngine: UnlockEngine;
  joinCode?: () => string;
}

export function createMembershipService({ repository, now, unlockEngine, joinCode = generateJoinCode }: MembershipDeps) {
  async function requirePerson(personId: string) {
    const person = await repository.getPerson(personId);
    if (!person) {
      throw new NotFoundError('Person not found');
    }
    return person;
  }

  async function requireTeam(teamId: string) {
    const team = await repository.getTeam(teamId);
    if (!team) {
      throw new NotFoundError('Team not found');
    }
    return team;
  }

  async function assertNotOnTeam(huntId: string, personId: string) {
    const existing = await repository.findTeamForPerson(huntId, personId);
    if (existing) {
      throw new ConflictError('ALREADY_ON_TEAM', `Already registered with team ${existing.name}`);
    }
  }

  async function createTeam(huntId: string, personId: string, name: string, location: string): Promise<TeamRow> {
    const teamName = name.trim();
    if (!teamName) {
      throw new ValidationError('Team name is required', { field: 'name' });
    }
    if (teamName.length > 200) {
      throw new ValidationError('Team name is too long', { field: 'name' });
    }

    const hunt = await repository.getHunt(huntId);
    if (!hunt) {
      throw new NotFoundError('Hunt not found');
    }
    await requirePerson(personId);

    if (await repository.findTeamByName(huntId, teamName)) {
      throw new ConflictError('ALREADY_EXISTS', 'A team with this name already exists');
    }
    await assertNotOnTeam(huntId, personId);

    const team = await repository.insertTeam({
      hunt_id: huntId,
      name: teamName,
      location: location.trim(),
      join_code: joinCode(),
      playtester: false,
    });
    await repository.addMember(team.id, personId);
    await repository.insertActivity({
      action: 'team_created',
      huntId,
      teamId: team.id,
      personId,
      details: { name: team.name },
      createdAt: now().toISOString(),
    });

    await unlockEngine.reconcile(team);
    return team;
  }

  async function joinTeam(personId: string, huntId: string, teamName: string, code: string): Promise<TeamRow> {
    await requirePerson(personId);

    const team = await repository.findTeamByName(huntId, teamName.trim());
    if (!team) {
      throw new NotFoundError('Team not found');
    }
    const hunt = await repository.getHunt(team.hunt_id);
    if (!hunt) {
      throw new NotFoundError('Hunt not found');
    }

    const members = await repository.listMemberIds(team.id);
    if (members.includes(personId)) {
      return team;
    }
    if (members.length >= hunt.team_size) {
      throw new ConflictError('FULL', 'Team is full');
    }
    if (team.join_code.toLowerCase() !== code.trim().toLowerCase()) {
      throw new ConflictError('BAD_CODE', 'Join code does not match');
    }
    await assertNotOnTeam(huntId, personId);

    await repository.addMember(team.id, personId);
    await repository.insertActivity({
      action: 'team_joined',
      huntId,
      teamId: team.id,
      personId,
      createdAt: now().toISOString(),
    });
    return team;
  }

  async function leaveTeam(personId: string, teamId: string): Promise<void> {
    const team = await requireTeam(teamId);
    await repository.removeMember(team.id, personId);
    await repository.insertActivity({
      action: 'team_left',
      huntId: team.hunt_id,
      teamId: team.id,
      personId,
      createdAt: now().toISOString(),
    });
  }

  async function teamForPerson(huntId: string, personId: string) {
    return repository.findTeamForPerson(huntId, personId);
  }

  async function setPlaytester(teamId: string, playtester: boolean) {
    await requireTeam(teamId);
    const team = await repository.setPlaytester(teamId, playtester);
    await repository.insertActivity({
      action: 'team_playtester_changed',
      huntId: team.hunt_id,
      teamId,
      details: { kind: teamKind(team) },
      createdAt: now().toISOString(),
    });
    return team;
  }

  async function isMember(teamId: string, personId: string) {
    const members = await repository.listMemberIds(teamId);
    return members.includes(personId);
  }

  return { createTeam, joinTeam, leaveTeam, teamForPerson, setPlaytester, isMember, requireTeam };
}

export type MembershipService = ReturnType<typeof createMembershipService>;
