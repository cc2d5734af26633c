import { TeamDerivationService } from './team-derivation.service';
import { createEngineFixture, warnings, type EngineFixture } from '../../../../test/helpers/engine.fixture';
import { GatewayError } from '../../../domain/errors/gateway-error';
import { firstValue } from '../../../domain/models/directory-entry.model';
import { EVERYBODY_TEAM, decodeDivision, decodeFranchise } from '../../../domain/models/hierarchy.model';

describe('TeamDerivationService', () => {
  let fixture: EngineFixture;
  let service: TeamDerivationService;

  beforeEach(async () => {
    fixture = await createEngineFixture();
    service = fixture.module.get(TeamDerivationService);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  const addDivision = async (machineName: string, displayName: string) =>
    decodeDivision(await fixture.directory.createDivision(machineName, displayName));
  const addFranchise = async (machineName: string) => decodeFranchise(await fixture.directory.createFranchise(machineName));

  describe('ensureTeamsForNewFranchise', () => {
    it('should create one team per existing division', async () => {
      await addDivision('ops', 'Operations');
      await addDivision('sales', 'Sales');
      const east = await addFranchise('east');

      const outcome = await service.ensureTeamsForNewFranchise(east);

      expect(outcome).toEqual({
        status: 'succeeded',
        skipped: 0,
        value: { created: ['east-ops', 'east-sales'], skipped: [], failed: [] },
      });
      const team = await fixture.directory.getTeam('east-ops');
      expect(firstValue(team, 'description')).toBe('EAST Operations');
    });

    it('should succeed with nothing to do when there are no divisions', async () => {
      const outcome = await service.ensureTeamsForNewFranchise(await addFranchise('east'));
      expect(outcome).toEqual({ status: 'succeeded', skipped: 0, value: { created: [], skipped: [], failed: [] } });
    });

    it('should skip teams that already exist on a rerun', async () => {
      await addDivision('ops', 'Operations');
      const east = await addFranchise('east');
      await service.ensureTeamsForNewFranchise(east);

      const outcome = await service.ensureTeamsForNewFranchise(east);

      expect(outcome).toEqual({
        status: 'succeeded_with_skips',
        skipped: 1,
        value: { created: [], skipped: ['east-ops'], failed: [] },
      });
      expect(fixture.directory.teamNames()).toEqual(['east-ops']);
    });

    it('should keep going past a failed team and report a partial failure', async () => {
      await addDivision('ops', 'Operations');
      await addDivision('sales', 'Sales');
      await addDivision('legal', 'Legal');
      const east = await addFranchise('east');
      const createTeam = fixture.directory.createTeam.bind(fixture.directory);
      jest.spyOn(fixture.directory, 'createTeam').mockImplementation(async (machineName, displayName) => {
        if (machineName === 'east-sales') throw GatewayError.unavailable('Directory');
        return createTeam(machineName, displayName);
      });

      const outcome = await service.ensureTeamsForNewFranchise(east);

      expect(outcome.status).toBe('failed');
      if (outcome.status !== 'failed') return;
      expect(outcome.error).toEqual({ kind: 'PartialFailure', message: '1 of 3 teams could not be created' });
      expect(outcome.value).toEqual({
        created: ['east-ops', 'east-legal'],
        skipped: [],
        failed: [{ team: 'east-sales', kind: 'GatewayUnavailable', message: 'Directory unavailable' }],
      });
      expect(warnings(fixture.logger)).toEqual(['Team creation failed']);
    });

    it('should fail without creating anything when divisions cannot be listed', async () => {
      const east = await addFranchise('east');
      fixture.directory.setAvailable(false);

      const outcome = await service.ensureTeamsForNewFranchise(east);

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'GatewayUnavailable', message: 'Directory unavailable' },
      });
      fixture.directory.setAvailable(true);
      expect(fixture.directory.teamNames()).toEqual([]);
    });
  });

  describe('ensureTeamsForNewDivision', () => {
    it('should create one team per existing franchise', async () => {
      await addFranchise('east');
      await addFranchise('west');
      const legal = await addDivision('legal', 'Legal');

      const outcome = await service.ensureTeamsForNewDivision(legal);

      expect(outcome.status).toBe('succeeded');
      expect(fixture.directory.teamNames()).toEqual(['east-legal', 'west-legal']);
      expect(firstValue(await fixture.directory.getTeam('west-legal'), 'description')).toBe('WEST Legal');
    });

    it('should complete the cross product when both axes grow', async () => {
      await addDivision('ops', 'Operations');
      await addDivision('sales', 'Sales');
      await service.ensureTeamsForNewFranchise(await addFranchise('east'));
      await service.ensureTeamsForNewDivision(await addDivision('legal', 'Legal'));
      await service.ensureTeamsForNewFranchise(await addFranchise('west'));

      expect(fixture.directory.teamNames().sort()).toEqual([
        'east-legal',
        'east-ops',
        'east-sales',
        'west-legal',
        'west-ops',
        'west-sales',
      ]);
    });
  });

  describe('hyphenated machine names', () => {
    it('should record pairs with a hyphenated franchise as InvalidName and create the rest', async () => {
      await addFranchise('a');
      await addFranchise('a-b');
      const c = await addDivision('c', 'C');

      const outcome = await service.ensureTeamsForNewDivision(c);

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'PartialFailure', message: '1 of 2 teams could not be created' },
        value: {
          created: ['a-c'],
          skipped: [],
          failed: [{ team: 'a-b-c', kind: 'InvalidName', message: "Franchise name 'a-b' must be lowercase letters and digits separated by single underscores" }],
        },
      });
      expect(fixture.directory.teamNames()).toEqual(['a-c']);
    });

    it('should not derive teams for a hyphenated division', async () => {
      await addFranchise('a');
      const listFranchises = jest.spyOn(fixture.directory, 'getFranchises');

      const outcome = await service.ensureTeamsForNewDivision(await addDivision('b-c', 'B C'));

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'InvalidName', message: "Division name 'b-c' must be lowercase letters and digits separated by single underscores" },
      });
      expect(listFranchises).not.toHaveBeenCalled();
      expect(fixture.directory.teamNames()).toEqual([]);
    });

    it('should not derive teams for a hyphenated franchise', async () => {
      await addDivision('c', 'C');

      const outcome = await service.ensureTeamsForNewFranchise(await addFranchise('a-b'));

      expect(outcome).toEqual({
        status: 'failed',
        error: { kind: 'InvalidName', message: "Franchise name 'a-b' must be lowercase letters and digits separated by single underscores" },
      });
      expect(fixture.directory.teamNames()).toEqual([]);
    });
  });

  describe('ensureSingleton', () => {
    it('should create the team when absent', async () => {
      const outcome = await service.ensureSingleton(EVERYBODY_TEAM);
      expect(outcome).toEqual({
        status: 'succeeded',
        skipped: 0,
        value: { machineName: 'everybody', displayName: 'Everybody', dn: 'cn=everybody,ou=teams,dc=hierarchy,dc=local' },
      });
    });

    it('should return the existing team without creating it again', async () => {
      await fixture.directory.createTeam('everybody', 'Everybody');
      const createTeam = jest.spyOn(fixture.directory, 'createTeam');

      const outcome = await service.ensureSingleton(EVERYBODY_TEAM);

      expect(outcome.status).toBe('succeeded');
      expect(createTeam).not.toHaveBeenCalled();
    });

    it('should converge when another caller creates the team concurrently', async () => {
      await fixture.directory.createTeam('everybody', 'Everybody');
      jest.spyOn(fixture.directory, 'getTeam').mockRejectedValueOnce(GatewayError.notFound('Team everybody'));

      const outcome = await service.ensureSingleton(EVERYBODY_TEAM);

      expect(outcome.status).toBe('succeeded');
      expect(fixture.directory.teamNames()).toEqual(['everybody']);
    });

    it('should fail on a transport error', async () => {
      fixture.directory.setAvailable(false);
      const outcome = await service.ensureSingleton(EVERYBODY_TEAM);
      expect(outcome.status).toBe('failed');
    });
  });
});
