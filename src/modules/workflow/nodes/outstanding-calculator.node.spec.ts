import { OutstandingCalculatorNode, toPaymentStatus } from './outstanding-calculator.node';

describe('OutstandingCalculatorNode', () => {
  let node: OutstandingCalculatorNode;

  beforeEach(() => {
    node = new OutstandingCalculatorNode();
  });

  describe('toPaymentStatus', () => {
    it('should classify payments', () => {
      expect(toPaymentStatus(1000, 1000)).toBe('Paid');
      expect(toPaymentStatus(1000, 1200)).toBe('Paid');
      expect(toPaymentStatus(1000, 0)).toBe('Unpaid');
      expect(toPaymentStatus(1000, 400)).toBe('Partially Paid');
    });
  });

  it('should compute outstanding, gross amount and status', async () => {
    const result = await node.run([
      { id: 'a', total_amount: 1000, paid_amount: 400, tax_amount: 100 },
    ]);

    expect(result.records[0]).toEqual({
      id: 'a',
      total_amount: 1000,
      paid_amount: 400,
      tax_amount: 100,
      outstanding: 600,
      outstanding_amount: 600,
      gross_amount: 900,
      status: 'Partially Paid',
    });
  });

  it('should use fallback amount fields', async () => {
    const result = await node.run([
      { inr_amount: 0, grand_total: 500, received_amount: 500, tax_total: 50 },
    ]);

    expect(result.records[0].outstanding).toBe(0);
    expect(result.records[0].gross_amount).toBe(450);
    expect(result.records[0].status).toBe('Paid');
  });

  it('should treat a record without amounts as fully paid', async () => {
    const result = await node.run([{ id: 'empty' }]);

    expect(result.records[0].outstanding).toBe(0);
    expect(result.records[0].status).toBe('Paid');
  });

  it('should round to cents', async () => {
    const result = await node.run([{ total_amount: 0.3, paid_amount: 0.1 }]);

    expect(result.records[0].outstanding).toBe(0.2);
  });

  it('should keep overpayments as negative outstanding', async () => {
    const result = await node.run([{ total_amount: 1000, paid_amount: 1200 }]);

    expect(result.records[0].outstanding).toBe(-200);
    expect(result.records[0].status).toBe('Paid');
  });

  it('should give the same result when applied twice', async () => {
    const once = await node.run([{ total_amount: 1000, paid_amount: 250, tax_amount: 80 }]);
    const twice = await node.run(once);

    expect(twice).toEqual(once);
  });
});
