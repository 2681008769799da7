import { InvalidNodeParametersError } from '../errors/workflow.errors';
import { FilterNode } from './filter.node';

describe('FilterNode', () => {
  let node: FilterNode;

  const records = [
    { id: 'a', status: 'Paid', total_amount: 100, vendor_name: 'Acme', aging_bucket: '0-30' },
    { id: 'b', status: 'Unpaid', total_amount: 250, vendor_name: 'Globex', aging_bucket: '90+' },
    { id: 'c', status: 'Unpaid', total_amount: 40, aging_bucket: '31-60' },
  ];

  const filterIds = async (conditions: unknown[]): Promise<Array<string | undefined>> => {
    const result = await node.run(records, { conditions });
    return result.records.map((record) => record.id);
  };

  beforeEach(() => {
    node = new FilterNode();
  });

  it('should match equality', async () => {
    await expect(filterIds([{ field: 'status', operator: '=', value: 'Unpaid' }])).resolves.toEqual(
      ['b', 'c'],
    );
    await expect(filterIds([{ field: 'status', operator: '==', value: 'Paid' }])).resolves.toEqual(
      ['a'],
    );
  });

  it('should let records without the field pass only "!="', async () => {
    await expect(
      filterIds([{ field: 'vendor_name', operator: '!=', value: 'Acme' }]),
    ).resolves.toEqual(['b', 'c']);
    await expect(
      filterIds([{ field: 'vendor_name', operator: '=', value: 'Acme' }]),
    ).resolves.toEqual(['a']);
  });

  it('should compare numbers numerically', async () => {
    await expect(
      filterIds([{ field: 'total_amount', operator: '>', value: 50 }]),
    ).resolves.toEqual(['a', 'b']);
    await expect(
      filterIds([{ field: 'total_amount', operator: '>=', value: '100' }]),
    ).resolves.toEqual(['a', 'b']);
    await expect(
      filterIds([{ field: 'total_amount', operator: '<', value: 100 }]),
    ).resolves.toEqual(['c']);
    await expect(
      filterIds([{ field: 'total_amount', operator: '<=', value: 100 }]),
    ).resolves.toEqual(['a', 'c']);
  });

  it('should match membership with "in"', async () => {
    await expect(
      filterIds([{ field: 'aging_bucket', operator: 'in', value: ['31-60', '90+'] }]),
    ).resolves.toEqual(['b', 'c']);
  });

  it('should combine conditions with AND', async () => {
    await expect(
      filterIds([
        { field: 'status', operator: '=', value: 'Unpaid' },
        { field: 'total_amount', operator: '>', value: 100 },
      ]),
    ).resolves.toEqual(['b']);
  });

  it('should not order values of unrelated types', async () => {
    await expect(
      filterIds([{ field: 'vendor_name', operator: '>', value: 5 }]),
    ).resolves.toEqual([]);
  });

  it('should keep every record without conditions', async () => {
    await expect(filterIds([])).resolves.toEqual(['a', 'b', 'c']);
    const result = await node.run(records);
    expect(result.records).toHaveLength(3);
  });

  it('should reject unknown operators', async () => {
    await expect(
      node.run(records, { conditions: [{ field: 'status', operator: 'like', value: 'P' }] }),
    ).rejects.toThrow(InvalidNodeParametersError);
  });

  it('should require a list for "in"', async () => {
    await expect(
      node.run(records, { conditions: [{ field: 'status', operator: 'in', value: 'Paid' }] }),
    ).rejects.toThrow('conditions.0.value: value must be an array for the "in" operator');
  });
});
