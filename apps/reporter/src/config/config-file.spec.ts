import * as path from 'path';

import {
  ConfigFileNotFoundError,
  defaultConfigSearchPaths,
  resolveConfigFile,
} from './config-file';

describe('config file resolution', () => {
  const searchPaths = defaultConfigSearchPaths('/home/reporter');

  it('should search the home and /etc locations in order', () => {
    expect(searchPaths).toEqual([
      '/home/reporter/.ipam-report/ipam-report.env',
      '/home/reporter/ipam-report.env',
      '/etc/ipam-report/ipam-report.env',
      '/etc/ipam-report.env',
    ]);
  });

  it('should use the explicit path when it exists', () => {
    const exists = jest.fn().mockReturnValue(true);

    expect(resolveConfigFile('/opt/ipam/report.env', { exists, searchPaths })).toBe(
      '/opt/ipam/report.env',
    );
    expect(exists).toHaveBeenCalledTimes(1);
  });

  it('should resolve a relative explicit path against the working directory', () => {
    const exists = jest.fn().mockReturnValue(true);

    expect(resolveConfigFile('report.env', { exists })).toBe(path.resolve('report.env'));
  });

  it('should fail when the explicit path does not exist, without searching defaults', () => {
    const exists = jest.fn((candidate: string) => candidate !== '/opt/ipam/missing.env');

    expect(() => resolveConfigFile('/opt/ipam/missing.env', { exists, searchPaths })).toThrow(
      'Configuration file not found: /opt/ipam/missing.env',
    );
  });

  it('should pick the first existing default location', () => {
    const exists = (candidate: string) => candidate.startsWith('/etc/');

    expect(resolveConfigFile(undefined, { exists, searchPaths })).toBe(
      '/etc/ipam-report/ipam-report.env',
    );
  });

  it('should list the searched paths when nothing is found', () => {
    let thrown: unknown;
    try {
      resolveConfigFile(undefined, { exists: () => false, searchPaths });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigFileNotFoundError);
    expect(thrown).toMatchObject({
      searched: searchPaths,
      explicit: false,
      message: expect.stringContaining('no --config-file option was given'),
    });
  });
});
