// Mock DependencyInjectionService before importing
jest.mock('../../services/dependency-injection', () => ({
  DependencyInjectionService: {
    getInstance: jest.fn()
  }
}));

import { SkillsCommand } from './skills-command';
import { DependencyInjectionService } from '../../services/dependency-injection';
import type { Skills } from '@taskloom/core';

// Mock console methods to capture output
const mockConsoleLog = jest.spyOn(console, 'log').mockImplementation();
const mockConsoleError = jest.spyOn(console, 'error').mockImplementation();
const mockProcessExit = jest.spyOn(process, 'exit').mockImplementation();

const shellMetadata: Skills.SkillMetadata = {
  name: 'local_shell',
  description: 'Run shell commands',
  version: '1.0.0',
  author: 'taskloom',
  parameters: {
    action: { type: 'string', required: false, default: 'run' },
    command: { type: 'string', required: false, default: null, description: 'Command to run' },
    timeout: { type: 'number', required: false, default: 30, description: 'Seconds before run is killed' },
    repo: { type: 'string', required: true, default: null }
  }
};

describe('SkillsCommand', () => {
  let skillsCommand: SkillsCommand;
  let mockRegistry: { listSkills: jest.MockedFunction<() => Skills.SkillMetadata[]> };

  beforeEach(() => {
    jest.clearAllMocks();
    mockRegistry = { listSkills: jest.fn().mockReturnValue([shellMetadata]) };
    (DependencyInjectionService.getInstance as jest.Mock).mockReturnValue({
      getSkillRegistry: jest.fn().mockResolvedValue(mockRegistry)
    });
    skillsCommand = new SkillsCommand();
  });

  describe('list', () => {
    it('should print one line per skill', async () => {
      await skillsCommand.executeSubCommand('list', [], {});

      expect(mockConsoleLog.mock.calls.map((call) => call[0])).toEqual([
        '🧩 1 skill(s) available:',
        '  • local_shell v1.0.0 - Run shell commands (taskloom)'
      ]);
    });

    it('should warn when nothing is registered', async () => {
      mockRegistry.listSkills.mockReturnValue([]);

      await skillsCommand.executeSubCommand('list', [], {});

      expect(mockConsoleLog).toHaveBeenCalledWith('⚠️ No skills registered');
    });

    it('should print the metadata list in JSON mode', async () => {
      await skillsCommand.executeSubCommand('list', [], { json: true });

      expect(mockConsoleLog).toHaveBeenCalledWith(JSON.stringify({ success: true, data: [shellMetadata] }, null, 2));
    });
  });

  describe('info', () => {
    it('should describe every parameter', async () => {
      await skillsCommand.executeSubCommand('info', ['local_shell'], {});

      expect(mockConsoleLog.mock.calls.map((call) => call[0])).toEqual([
        '🧩 local_shell v1.0.0',
        'Run shell commands',
        'Author: taskloom',
        'Parameters:',
        '  • action (string, optional, default: "run")',
        '  • command (string, optional) - Command to run',
        '  • timeout (number, optional, default: 30) - Seconds before run is killed',
        '  • repo (string, required)'
      ]);
    });

    it('should fail for unknown skills', async () => {
      await skillsCommand.executeSubCommand('info', ['nope'], {});

      expect(mockConsoleError).toHaveBeenCalledWith('❌ Skill not found: nope');
      expect(mockProcessExit).toHaveBeenCalledWith(1);
    });
  });

  it('should report registry failures', async () => {
    (DependencyInjectionService.getInstance as jest.Mock).mockReturnValue({
      getSkillRegistry: jest.fn().mockRejectedValue(new Error('Invalid configuration: skills.modules must be array'))
    });
    skillsCommand = new SkillsCommand();

    await skillsCommand.executeSubCommand('list', [], {});

    expect(mockConsoleError).toHaveBeenCalledWith('❌ Invalid configuration: skills.modules must be array');
  });
});
