import { loadApprovalConfiguration } from '../../src/config/approval-config';

describe('loadApprovalConfiguration', () => {
  it('should accept a positive integer threshold', () => {
    expect(loadApprovalConfiguration(3)).toEqual({ minCount: 3 });
    expect(loadApprovalConfiguration(1).minCount).toBe(1);
  });

  it('should return a frozen configuration', () => {
    expect(Object.isFrozen(loadApprovalConfiguration(2))).toBe(true);
  });

  it.each([0, -1, 2.5, NaN])('should reject %p', (minCount) => {
    expect(() => loadApprovalConfiguration(minCount)).toThrow('Invalid approval threshold');
  });
});
