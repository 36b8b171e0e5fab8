import { describe, it, expect } from 'vitest';
import { LinkType, createLink, deserializeLink, isLinkTo, serializeLink } from './operationLink';
import { d } from '../../utils/test/mockData';

describe('OperationLink', () => {
  it('should default to an automatic link without notes', () => {
    const link = createLink(4, LinkType.BUDGET, 2, d('2025-01-01'));

    expect(link.isManual).toBe(false);
    expect(link.notes).toBeNull();
  });

  it('should identify its target by type and id', () => {
    const link = createLink(4, LinkType.BUDGET, 2, d('2025-01-01'));

    expect(isLinkTo(link, LinkType.BUDGET, 2)).toBe(true);
    expect(isLinkTo(link, LinkType.PLANNED_OPERATION, 2)).toBe(false);
    expect(isLinkTo(link, LinkType.BUDGET, 3)).toBe(false);
  });

  it('should store the iteration date as a string', () => {
    const link = createLink(4, LinkType.PLANNED_OPERATION, 1, d('2025-03-01'), {
      isManual: true,
      notes: 'paid early',
    });

    const data = serializeLink(link);

    expect(data).toEqual({
      operationId: 4,
      targetType: 'planned_operation',
      targetId: 1,
      iterationDate: '2025-03-01',
      isManual: true,
      notes: 'paid early',
    });
    expect(deserializeLink(data)).toEqual(link);
  });
});
