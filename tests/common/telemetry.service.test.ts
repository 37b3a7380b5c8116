import { TelemetryService } from '../../src/common/services/telemetry.service';

describe('TelemetryService', () => {
  afterEach(() => jest.restoreAllMocks());

  it('writes high severity events as errors', () => {
    const error = jest.spyOn(console, 'error').mockImplementation(() => undefined);

    new TelemetryService().record('CourseAvailabilitySystemError', { error: 'down', severity: 'HIGH' });

    expect(error).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(error.mock.calls[0][0]));
    expect(line).toMatchObject({
      service: 'course-availability',
      event: 'CourseAvailabilitySystemError',
      error: 'down',
      severity: 'HIGH',
    });
  });

  it('writes medium severity events as warnings and the rest as debug', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    const telemetry = new TelemetryService();

    telemetry.record('CourseAvailabilityCheckFailed', { severity: 'MEDIUM' });
    telemetry.record('CourseAvailabilityCheck', { skill_count: 2 });

    expect(warn).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(debug.mock.calls[0][0]))).toMatchObject({ event: 'CourseAvailabilityCheck', skill_count: 2 });
  });

  it('drops events that cannot be serialized', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => new TelemetryService().record('Broken', circular)).not.toThrow();
    expect(warn).toHaveBeenCalledWith('[TelemetryService] Dropped telemetry event Broken', expect.any(TypeError));
  });
});
