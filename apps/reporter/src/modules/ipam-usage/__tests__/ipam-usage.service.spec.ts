import { Test, TestingModule } from '@nestjs/testing';
import { Queryable } from '@ipam-report/database';

import { AppConfigService, IpamUsageOptions } from '../../../config/app.config';
import { DatabaseService } from '../../../database/database.service';
import { IpamUsageRepository } from '../ipam-usage.repository';
import { IpamUsageService } from '../ipam-usage.service';

describe('IpamUsageService', () => {
  let service: IpamUsageService;
  let repository: { countUsedIps: jest.Mock; findSubnetCapacities: jest.Mock };
  let database: { readOnly: jest.Mock };

  const db = { query: jest.fn() } as unknown as Queryable;
  const options: IpamUsageOptions = {
    networkId: 'net-public',
    providerTenant: 'provider',
    reuseAfterSeconds: 7200,
  };
  const now = new Date('2024-03-10T12:00:00.000Z');

  beforeEach(async () => {
    repository = {
      countUsedIps: jest.fn(),
      findSubnetCapacities: jest.fn(),
    };
    database = {
      readOnly: jest.fn((fn: (client: Queryable) => Promise<unknown>) => fn(db)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        IpamUsageService,
        { provide: IpamUsageRepository, useValue: repository },
        { provide: DatabaseService, useValue: database },
        { provide: AppConfigService, useValue: { ipam: options } },
      ],
    }).compile();

    service = module.get<IpamUsageService>(IpamUsageService);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('getUsedIps', () => {
    it('should query with the cutoff at the start of the reuse window', async () => {
      repository.countUsedIps.mockResolvedValue([]);

      await service.getUsedIps(db, options, now);

      expect(repository.countUsedIps).toHaveBeenCalledWith(
        db,
        options,
        new Date('2024-03-10T10:00:00.000Z'),
      );
    });

    it('should move the cutoff with the configured window', async () => {
      repository.countUsedIps.mockResolvedValue([]);

      await service.getUsedIps(db, { ...options, reuseAfterSeconds: 0 }, now);

      expect(repository.countUsedIps.mock.calls[0][2]).toEqual(now);
    });

    it('should map rows to tenant counts', async () => {
      repository.countUsedIps.mockResolvedValue([
        { tenant_id: 'acme-1', used: 5 },
        { tenant_id: 'provider', used: 0 },
      ]);

      await expect(service.getUsedIps(db, options, now)).resolves.toEqual({
        'acme-1': 5,
        provider: 0,
      });
    });
  });

  describe('getUnusedIps', () => {
    it('should subtract exclusions and used counts from subnet sizes', async () => {
      repository.findSubnetCapacities.mockResolvedValue([
        {
          subnet_id: 's-1',
          tenant_id: 'acme-1',
          cidr: '192.168.10.0/24',
          excluded_cidrs: ['192.168.10.0/29', '192.168.10.254/31'],
        },
      ]);

      const unused = await service.getUnusedIps(db, { 'acme-1': 5 }, options);

      expect(repository.findSubnetCapacities).toHaveBeenCalledWith(db, options);
      expect(unused).toEqual({ 'acme-1': 241 });
    });
  });

  describe('generateReport', () => {
    it('should run both counts in one read-only transaction', async () => {
      repository.countUsedIps.mockResolvedValue([{ tenant_id: 'acme-1', used: 0 }]);
      repository.findSubnetCapacities.mockResolvedValue([
        { subnet_id: 's-1', tenant_id: 'acme-1', cidr: '10.0.0.0/24', excluded_cidrs: [] },
      ]);

      const report = await service.generateReport(now);

      expect(database.readOnly).toHaveBeenCalledTimes(1);
      expect(report).toEqual({ used: { 'acme-1': 0 }, unused: { 'acme-1': 256 } });
    });

    it('should use the configured network and tenant filter', async () => {
      repository.countUsedIps.mockResolvedValue([]);
      repository.findSubnetCapacities.mockResolvedValue([]);

      await service.generateReport(now);

      expect(repository.countUsedIps).toHaveBeenCalledWith(
        db,
        options,
        new Date('2024-03-10T10:00:00.000Z'),
      );
      expect(repository.findSubnetCapacities).toHaveBeenCalledWith(db, options);
    });

    it('should return empty mappings when no subnet qualifies', async () => {
      repository.countUsedIps.mockResolvedValue([]);
      repository.findSubnetCapacities.mockResolvedValue([]);

      await expect(service.generateReport(now)).resolves.toEqual({ used: {}, unused: {} });
    });

    it('should propagate query failures without a report', async () => {
      repository.countUsedIps.mockRejectedValue(new Error('relation "subnets" does not exist'));

      await expect(service.generateReport(now)).rejects.toThrow(
        'relation "subnets" does not exist',
      );
      expect(repository.findSubnetCapacities).not.toHaveBeenCalled();
    });
  });
});
