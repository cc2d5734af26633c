import { MembershipCascadeService } from './membership-cascade.service';
import { createEngineFixture, type EngineFixture } from '../../../../test/helpers/engine.fixture';
import { GatewayError } from '../../../domain/errors/gateway-error';
import { divisionGroup, franchiseGroup, teamGroup } from '../../../domain/models/hierarchy.model';

describe('MembershipCascadeService', () => {
  let fixture: EngineFixture;
  let service: MembershipCascadeService;

  const jane = { uid: 'jdoe', givenName: 'Jane', surname: 'Doe', mail: 'jdoe@example.com' };

  beforeEach(async () => {
    fixture = await createEngineFixture();
    service = fixture.module.get(MembershipCascadeService);

    const { directory } = fixture;
    await directory.createFranchise('east');
    await directory.createDivision('ops', 'Operations');
    await directory.createTeam('east-ops', 'EAST Operations');
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('addUserToTeam', () => {
    beforeEach(async () => {
      await fixture.directory.createUser(jane, 'test-secret');
    });

    it('should join the team, then its franchise, then its division', async () => {
      const addMembership = jest.spyOn(fixture.directory, 'addMembership');

      const outcome = await service.addUserToTeam('jdoe', 'east-ops');

      expect(addMembership.mock.calls).toEqual([
        ['jdoe', teamGroup('east-ops')],
        ['jdoe', franchiseGroup('east')],
        ['jdoe', divisionGroup('ops')],
      ]);
      expect(outcome).toEqual({
        status: 'succeeded',
        skipped: 0,
        value: {
          uid: 'jdoe',
          team: 'east-ops',
          joined: [teamGroup('east-ops'), franchiseGroup('east'), divisionGroup('ops')],
          alreadyMember: [],
        },
      });
    });

    it('should be idempotent', async () => {
      await service.addUserToTeam('jdoe', 'east-ops');

      const outcome = await service.addUserToTeam('jdoe', 'east-ops');

      expect(outcome.status).toBe('succeeded_with_skips');
      if (outcome.status === 'failed') return;
      expect(outcome.skipped).toBe(3);
      expect(outcome.value.joined).toEqual([]);
    });

    it('should treat an existing franchise membership as success', async () => {
      await fixture.directory.addMembership('jdoe', franchiseGroup('east'));

      const outcome = await service.addUserToTeam('jdoe', 'east-ops');

      expect(outcome.status).toBe('succeeded_with_skips');
      if (outcome.status === 'failed') return;
      expect(outcome.value.alreadyMember).toEqual([franchiseGroup('east')]);
      expect(fixture.directory.isMember('jdoe', divisionGroup('ops'))).toBe(true);
    });

    it('should join only the team when it has no owning pair', async () => {
      await fixture.directory.createTeam('international', 'International');

      const outcome = await service.addUserToTeam('jdoe', 'international');

      expect(outcome.status).toBe('succeeded');
      if (outcome.status === 'failed') return;
      expect(outcome.value.joined).toEqual([teamGroup('international')]);
      expect(fixture.directory.isMember('jdoe', franchiseGroup('east'))).toBe(false);
    });

    it('should fail with NotFound and make no membership calls for an unknown team', async () => {
      const addMembership = jest.spyOn(fixture.directory, 'addMembership');

      const outcome = await service.addUserToTeam('jdoe', 'west-ops');

      expect(outcome).toEqual({ status: 'failed', error: { kind: 'NotFound', message: 'Team west-ops not found' } });
      expect(addMembership).not.toHaveBeenCalled();
    });

    it('should stop at the first failed membership and report what was joined', async () => {
      const addMembership = fixture.directory.addMembership.bind(fixture.directory);
      jest.spyOn(fixture.directory, 'addMembership').mockImplementation(async (uid, group) => {
        if (group.kind === 'franchise') throw GatewayError.unavailable('Directory');
        return addMembership(uid, group);
      });

      const outcome = await service.addUserToTeam('jdoe', 'east-ops');

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'GatewayUnavailable', message: 'Directory unavailable' },
        value: { uid: 'jdoe', team: 'east-ops', joined: [teamGroup('east-ops')], alreadyMember: [] },
      });
      expect(fixture.directory.isMember('jdoe', divisionGroup('ops'))).toBe(false);
    });
  });

  describe('provisionNewUser', () => {
    it('should create the user and join everybody when no teams are given', async () => {
      const outcome = await service.provisionNewUser(jane, 'test-secret', []);

      expect(outcome).toEqual({
        status: 'succeeded',
        skipped: 0,
        value: {
          uid: 'jdoe',
          givenName: 'Jane',
          surname: 'Doe',
          mail: 'jdoe@example.com',
          teams: ['everybody'],
          dn: 'uid=jdoe,ou=people,dc=hierarchy,dc=local',
        },
      });
      expect(fixture.directory.isMember('jdoe', teamGroup('everybody'))).toBe(true);
    });

    it('should cascade initial teams before joining everybody', async () => {
      const outcome = await service.provisionNewUser(jane, 'test-secret', ['east-ops', 'east-ops']);

      expect(outcome.status).toBe('succeeded');
      if (outcome.status === 'failed') return;
      expect(outcome.value.teams).toEqual(['east-ops', 'everybody']);
      expect(fixture.directory.isMember('jdoe', franchiseGroup('east'))).toBe(true);
      expect(fixture.directory.isMember('jdoe', divisionGroup('ops'))).toBe(true);
    });

    it('should accept everybody as an initial team in a fresh directory', async () => {
      const outcome = await service.provisionNewUser(jane, 'test-secret', ['everybody']);

      expect(outcome.status).toBe('succeeded');
      if (outcome.status === 'failed') return;
      expect(outcome.value.teams).toEqual(['everybody']);
      expect(fixture.directory.isMember('jdoe', teamGroup('everybody'))).toBe(true);
    });

    it('should leave the user out of everybody when an initial team is missing', async () => {
      const outcome = await service.provisionNewUser(jane, 'test-secret', ['west-ops']);

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error).toEqual({
        kind: 'NotFound',
        message: 'Provisioning jdoe stopped at team west-ops: Team west-ops not found',
      });
      expect(outcome.value?.uid).toBe('jdoe');
      expect(fixture.directory.isMember('jdoe', teamGroup('everybody'))).toBe(false);
    });

    it('should fail with AlreadyExists for a duplicate uid', async () => {
      await fixture.directory.createUser(jane, 'test-secret');

      const outcome = await service.provisionNewUser(jane, 'test-secret', []);

      expect(outcome).toEqual({ status: 'failed', error: { kind: 'AlreadyExists', message: 'User jdoe already exists' } });
    });
  });

  describe('getUserTeams', () => {
    it('should list the teams a user belongs to', async () => {
      await service.provisionNewUser(jane, 'test-secret', ['east-ops']);

      const outcome = await service.getUserTeams('jdoe');

      expect(outcome.status).toBe('succeeded');
      if (outcome.status === 'failed') return;
      expect(outcome.value.map((t) => t.machineName)).toEqual(['east-ops', 'everybody']);
    });

    it('should fail with NotFound for an unknown user', async () => {
      expect((await service.getUserTeams('ghost')).status).toBe('failed');
    });
  });

  describe('removeUser', () => {
    it('should delete the user', async () => {
      await fixture.directory.createUser(jane, 'test-secret');

      expect(await service.removeUser('jdoe')).toEqual({ status: 'succeeded', skipped: 0, value: { uid: 'jdoe' } });
      await expect(fixture.directory.getUser('jdoe')).rejects.toMatchObject({ kind: 'NotFound' });
    });

    it('should fail with NotFound for an unknown user', async () => {
      expect(await service.removeUser('ghost')).toEqual({
        status: 'failed',
        error: { kind: 'NotFound', message: 'User ghost not found' },
      });
    });
  });
});
