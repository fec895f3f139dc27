import { Test, TestingModule } from '@nestjs/testing';
import { BadRequestException } from '@nestjs/common';
import { AnalysisController } from './analysis.controller';
import {
  AnalysisInputError,
  AnalysisReport,
  AnalysisService,
} from './analysis.service';
import { IssueLabel, PerformanceStatus } from './core';

describe('AnalysisController', () => {
  let controller: AnalysisController;
  let service: jest.Mocked<AnalysisService>;

  const mockAnalysisService = {
    analyze: jest.fn(),
    resolveParameters: jest.fn(),
    getSupportedFormats: jest.fn(),
  };

  const createMockFile = (
    originalname: string,
    content = 'test content',
  ): Express.Multer.File => ({
    fieldname: 'files',
    originalname,
    encoding: '7bit',
    mimetype: 'text/csv',
    buffer: Buffer.from(content),
    size: content.length,
    destination: '',
    filename: '',
    path: '',
    stream: null as never,
  });

  const createReport = (): AnalysisReport => ({
    parameters: { pvCapacityMwp: 2.06, prThreshold: 0.75, efficiencyThreshold: 0.9 },
    sources: [],
    prRows: [],
    prStatistics: {
      count: 0,
      mean: null,
      std: null,
      min: null,
      p25: null,
      median: null,
      p75: null,
      max: null,
    },
    statusCounts: {
      [PerformanceStatus.GOOD]: 0,
      [PerformanceStatus.NEEDS_ATTENTION]: 0,
    },
    issueCounts: {
      [IssueLabel.CALIBRATION_NEEDED]: 0,
      [IssueLabel.MODULE_SOILING]: 0,
      [IssueLabel.SENSOR_OUTAGE]: 0,
    },
    prTimeline: [],
    inverterSummaries: [],
    durationMs: 5,
  });

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AnalysisController],
      providers: [
        {
          provide: AnalysisService,
          useValue: mockAnalysisService,
        },
      ],
    }).compile();

    controller = module.get<AnalysisController>(AnalysisController);
    service = module.get(AnalysisService);
    jest.clearAllMocks();
  });

  describe('analyze', () => {
    it('should throw BadRequestException when EM or RM is missing', async () => {
      await expect(controller.analyze(undefined, {})).rejects.toThrow(
        BadRequestException,
      );
      await expect(
        controller.analyze({ em: [createMockFile('EM.csv')] }, {}),
      ).rejects.toThrow(
        'Both an EM file (field "em") and an RM file (field "rm") are required.',
      );
      await expect(
        controller.analyze({ rm: [createMockFile('RM.csv')] }, {}),
      ).rejects.toThrow(BadRequestException);

      expect(service.analyze).not.toHaveBeenCalled();
    });

    it('should pass files and coerced overrides to the service', async () => {
      const em = createMockFile('EM.csv', 'em');
      const rm = createMockFile('RM.csv', 'rm');
      const inv = createMockFile('INV01.csv', 'inv');
      const report = createReport();
      service.analyze.mockResolvedValue(report);

      const result = await controller.analyze(
        { em: [em], rm: [rm], inverters: [inv] },
        { prThreshold: '0.8' },
      );

      expect(result).toBe(report);
      expect(service.analyze).toHaveBeenCalledWith(
        {
          em: { filename: 'EM.csv', buffer: em.buffer },
          rm: { filename: 'RM.csv', buffer: rm.buffer },
          inverters: [{ filename: 'INV01.csv', buffer: inv.buffer }],
        },
        { prThreshold: 0.8 },
      );
    });

    it('should default to no inverters and no overrides', async () => {
      service.analyze.mockResolvedValue(createReport());

      await controller.analyze(
        { em: [createMockFile('EM.csv')], rm: [createMockFile('RM.csv')] },
        undefined,
      );

      expect(service.analyze).toHaveBeenCalledWith(
        expect.objectContaining({ inverters: [] }),
        {},
      );
    });

    it('should reject invalid or unknown parameters', async () => {
      const files = {
        em: [createMockFile('EM.csv')],
        rm: [createMockFile('RM.csv')],
      };

      await expect(
        controller.analyze(files, { prThreshold: 'abc' }),
      ).rejects.toThrow('Invalid analysis parameters: prThreshold:');
      await expect(
        controller.analyze(files, { pvCapacityMwp: '-1' }),
      ).rejects.toThrow(BadRequestException);
      await expect(
        controller.analyze(files, { pvCapacityMwp: 'Infinity' }),
      ).rejects.toThrow('Invalid analysis parameters: pvCapacityMwp:');
      await expect(
        controller.analyze(files, { prThreshold: '1e999' }),
      ).rejects.toThrow('Invalid analysis parameters: prThreshold:');
      await expect(
        controller.analyze(files, { efficiencyThreshold: 'Infinity' }),
      ).rejects.toThrow(BadRequestException);
      await expect(
        controller.analyze(files, { threshold: '0.8' }),
      ).rejects.toThrow('Invalid analysis parameters: body:');

      expect(service.analyze).not.toHaveBeenCalled();
    });

    it('should map AnalysisInputError to BadRequestException', async () => {
      service.analyze.mockRejectedValue(
        new AnalysisInputError(
          'EM.csv',
          'irradiance',
          '[EM.csv, irradiance] File is empty',
        ),
      );

      await expect(
        controller.analyze(
          { em: [createMockFile('EM.csv')], rm: [createMockFile('RM.csv')] },
          {},
        ),
      ).rejects.toThrow(
        new BadRequestException('[EM.csv, irradiance] File is empty'),
      );
    });

    it('should rethrow unexpected errors unchanged', async () => {
      const failure = new Error('boom');
      service.analyze.mockRejectedValue(failure);

      await expect(
        controller.analyze(
          { em: [createMockFile('EM.csv')], rm: [createMockFile('RM.csv')] },
          {},
        ),
      ).rejects.toBe(failure);
    });
  });

  describe('getDefaults', () => {
    it('should return resolved parameters and supported formats', () => {
      const parameters = {
        pvCapacityMwp: 2.06,
        prThreshold: 0.75,
        efficiencyThreshold: 0.9,
      };
      const formats = [
        { name: 'xlsx', description: 'Excel workbook' },
        { name: 'csv', description: 'CSV export' },
      ];
      service.resolveParameters.mockReturnValue(parameters);
      service.getSupportedFormats.mockReturnValue(formats);

      expect(controller.getDefaults()).toEqual({ parameters, formats });
    });
  });
});
