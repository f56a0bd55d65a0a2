import { classifySeverity, SEVERITY_EVALUATION_ORDER } from '../severity.utils';

describe('classifySeverity', () => {
  const thresholds = { warningPercent: 80, criticalPercent: 95 };

  it.each([0, 42.5, 79.99])('should classify %p%% as healthy', (p) => {
    expect(classifySeverity(p, thresholds)).toBe('healthy');
  });

  it.each([80, 85, 94.99])('should classify %p%% as warning', (p) => {
    expect(classifySeverity(p, thresholds)).toBe('warning');
  });

  it.each([95, 96, 100])('should classify %p%% as critical', (p) => {
    expect(classifySeverity(p, thresholds)).toBe('critical');
  });

  it('should evaluate critical before warning', () => {
    expect(SEVERITY_EVALUATION_ORDER).toEqual(['critical', 'warning']);
  });

  describe('when critical <= warning', () => {
    const inverted = { warningPercent: 90, criticalPercent: 70 };

    it('should resolve readings that meet both thresholds to critical', () => {
      expect(classifySeverity(95, inverted)).toBe('critical');
    });

    it('should resolve readings between the thresholds to critical', () => {
      expect(classifySeverity(75, inverted)).toBe('critical');
    });

    it('should stay healthy below both', () => {
      expect(classifySeverity(69, inverted)).toBe('healthy');
    });
  });

  it('should resolve equal thresholds to critical', () => {
    expect(classifySeverity(90, { warningPercent: 90, criticalPercent: 90 })).toBe('critical');
  });
});
