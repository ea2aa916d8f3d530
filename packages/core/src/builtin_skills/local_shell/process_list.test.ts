import { parsePsOutput, parseTasklistOutput } from './process_list';

describe('process_list', () => {
  describe('parsePsOutput', () => {
    it('should keep command names with spaces and skip malformed lines', () => {
      const stdout = '  77  0.3  1.25 /usr/lib/Some App\nPID %CPU\n\n  78  0.0  0.0 sh\n';

      expect(parsePsOutput(stdout)).toEqual([
        { pid: 77, name: 'Some App', cpuPercent: 0.3, memoryPercent: 1.25 },
        { pid: 78, name: 'sh', cpuPercent: 0, memoryPercent: 0 },
      ]);
    });
  });

  describe('parseTasklistOutput', () => {
    it('should turn kilobytes into a share of total memory', () => {
      const stdout = [
        '"svchost.exe","912","Services","0","2,048 K"',
        '"System Idle Process","0","Services","0","8 K"',
        'INFO: No tasks are running',
      ].join('\r\n');

      expect(parseTasklistOutput(stdout, 4 * 1024 * 1024)).toEqual([
        { pid: 912, name: 'svchost.exe', cpuPercent: null, memoryPercent: 50 },
        { pid: 0, name: 'System Idle Process', cpuPercent: null, memoryPercent: 0.2 },
      ]);
    });
  });
});
