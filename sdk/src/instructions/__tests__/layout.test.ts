import BN from 'bn.js';
import { decodePerpInstruction, encodePerpInstruction } from '../layout';
import { PerpInstruction, PerpInstructionData, PositionType } from '../../types/perp';
import { EncodingError } from '../../utils/errors';

const ONE_FP32 = new BN(1).shln(32);

/**
 * BN instances built differently are not structurally equal; compare them as strings
 */
function normalize(instruction: PerpInstructionData): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(instruction).map(([key, value]) => [
      key,
      BN.isBN(value) ? value.toString() : value,
    ])
  );
}

const SAMPLES: PerpInstructionData[] = [
  {
    kind: PerpInstruction.CreateMarket,
    signerNonce: 254,
    marketSymbol: 'SOL-PERP',
    initialVPcAmount: new BN('1000000000000'),
    coinDecimals: 9,
    quoteDecimals: 6,
  },
  { kind: PerpInstruction.AddInstance },
  { kind: PerpInstruction.UpdateOracleAccount },
  {
    kind: PerpInstruction.OpenPosition,
    side: PositionType.Long,
    collateral: new BN(1_000_000),
    instanceIndex: 2,
    leverage: ONE_FP32.muln(5),
    predictedEntryPrice: ONE_FP32.muln(42),
    maximumSlippageMargin: ONE_FP32.divn(100),
  },
  { kind: PerpInstruction.AddBudget, amount: new BN(500) },
  { kind: PerpInstruction.WithdrawBudget, amount: new BN('18446744073709551615') },
  {
    kind: PerpInstruction.IncreasePosition,
    addCollateral: new BN(250),
    instanceIndex: 1,
    leverage: ONE_FP32.muln(2),
    positionIndex: 300,
    predictedEntryPrice: ONE_FP32.muln(40),
    maximumSlippageMargin: ONE_FP32.divn(50),
  },
  {
    kind: PerpInstruction.ClosePosition,
    positionIndex: 65535,
    closingCollateral: new BN(100),
    closingVCoin: new BN(7),
    predictedEntryPrice: ONE_FP32.muln(41),
    maximumSlippageMargin: new BN(0),
  },
  { kind: PerpInstruction.CollectGarbage, instanceIndex: 0, maxIterations: new BN(5) },
  { kind: PerpInstruction.CrankLiquidation, instanceIndex: 3 },
  { kind: PerpInstruction.CrankFunding },
  { kind: PerpInstruction.FundingExtraction, instanceIndex: 255 },
  { kind: PerpInstruction.ChangeK, factor: ONE_FP32.muln(2) },
  { kind: PerpInstruction.CloseAccount },
  { kind: PerpInstruction.AddPage, instanceIndex: 4 },
  { kind: PerpInstruction.Rebalance, collateral: new BN(7), instanceIndex: 3 },
  { kind: PerpInstruction.TransferUserAccount },
  { kind: PerpInstruction.TransferPosition, positionIndex: 513 },
];

describe('instruction layout', () => {
  describe('discriminators', () => {
    it('should follow declaration order', () => {
      expect(PerpInstruction.CreateMarket).toBe(0);
      expect(PerpInstruction.AddInstance).toBe(1);
      expect(PerpInstruction.UpdateOracleAccount).toBe(2);
      expect(PerpInstruction.OpenPosition).toBe(3);
      expect(PerpInstruction.AddBudget).toBe(4);
      expect(PerpInstruction.WithdrawBudget).toBe(5);
      expect(PerpInstruction.IncreasePosition).toBe(6);
      expect(PerpInstruction.ClosePosition).toBe(7);
      expect(PerpInstruction.CollectGarbage).toBe(8);
      expect(PerpInstruction.CrankLiquidation).toBe(9);
      expect(PerpInstruction.CrankFunding).toBe(10);
      expect(PerpInstruction.FundingExtraction).toBe(11);
      expect(PerpInstruction.ChangeK).toBe(12);
      expect(PerpInstruction.CloseAccount).toBe(13);
      expect(PerpInstruction.AddPage).toBe(14);
      expect(PerpInstruction.Rebalance).toBe(15);
      expect(PerpInstruction.TransferUserAccount).toBe(16);
      expect(PerpInstruction.TransferPosition).toBe(17);
    });

    it('should write the discriminator as the first byte of every kind', () => {
      expect(SAMPLES.map((sample) => encodePerpInstruction(sample)[0])).toEqual(
        Array.from({ length: 18 }, (_, index) => index)
      );
    });
  });

  describe('encodePerpInstruction', () => {
    it('should encode CreateMarket', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.CreateMarket,
        signerNonce: 254,
        marketSymbol: 'SOL',
        initialVPcAmount: new BN(1000),
        coinDecimals: 9,
        quoteDecimals: 6,
      });

      expect([...data]).toEqual([
        0, 254, 3, 0, 0, 0, 0x53, 0x4f, 0x4c, 0xe8, 3, 0, 0, 0, 0, 0, 0, 9, 6,
      ]);
    });

    it('should encode CollectGarbage', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.CollectGarbage,
        instanceIndex: 0,
        maxIterations: new BN(5),
      });

      expect([...data]).toEqual([8, 0, 5, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('should encode OpenPosition fields in order', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.OpenPosition,
        side: PositionType.Long,
        collateral: new BN(1000),
        instanceIndex: 1,
        leverage: ONE_FP32,
        predictedEntryPrice: new BN(2),
        maximumSlippageMargin: new BN(3),
      });

      expect(data.length).toBe(35);
      expect([...data]).toEqual([
        3,
        1,
        0xe8, 3, 0, 0, 0, 0, 0, 0,
        1,
        0, 0, 0, 0, 1, 0, 0, 0,
        2, 0, 0, 0, 0, 0, 0, 0,
        3, 0, 0, 0, 0, 0, 0, 0,
      ]);
    });

    it('should place the u16 position index after leverage in IncreasePosition', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.IncreasePosition,
        addCollateral: new BN(1),
        instanceIndex: 2,
        leverage: new BN(3),
        positionIndex: 513,
        predictedEntryPrice: new BN(4),
        maximumSlippageMargin: new BN(5),
      });

      expect(data.length).toBe(36);
      expect(data[9]).toBe(2);
      expect([...data.subarray(18, 20)]).toEqual([1, 2]);
    });

    it('should encode ClosePosition', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.ClosePosition,
        positionIndex: 1,
        closingCollateral: new BN(2),
        closingVCoin: new BN(3),
        predictedEntryPrice: new BN(4),
        maximumSlippageMargin: new BN(5),
      });

      expect(data.length).toBe(35);
      expect([...data.subarray(0, 3)]).toEqual([7, 1, 0]);
      expect(data[3]).toBe(2);
      expect(data[11]).toBe(3);
      expect(data[19]).toBe(4);
      expect(data[27]).toBe(5);
    });

    it('should encode Rebalance', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.Rebalance,
        collateral: new BN(7),
        instanceIndex: 3,
      });

      expect([...data]).toEqual([15, 7, 0, 0, 0, 0, 0, 0, 0, 3]);
    });

    it('should encode TransferPosition', () => {
      const data = encodePerpInstruction({
        kind: PerpInstruction.TransferPosition,
        positionIndex: 513,
      });

      expect([...data]).toEqual([17, 1, 2]);
    });

    it('should encode budget amounts', () => {
      expect([
        ...encodePerpInstruction({ kind: PerpInstruction.AddBudget, amount: new BN(256) }),
      ]).toEqual([4, 0, 1, 0, 0, 0, 0, 0, 0]);
      expect([
        ...encodePerpInstruction({ kind: PerpInstruction.WithdrawBudget, amount: new BN(1) }),
      ]).toEqual([5, 1, 0, 0, 0, 0, 0, 0, 0]);
    });

    it('should encode kinds without arguments as a single byte', () => {
      expect([...encodePerpInstruction({ kind: PerpInstruction.AddInstance })]).toEqual([1]);
      expect([...encodePerpInstruction({ kind: PerpInstruction.UpdateOracleAccount })]).toEqual([2]);
      expect([...encodePerpInstruction({ kind: PerpInstruction.CrankFunding })]).toEqual([10]);
      expect([...encodePerpInstruction({ kind: PerpInstruction.CloseAccount })]).toEqual([13]);
      expect([...encodePerpInstruction({ kind: PerpInstruction.TransferUserAccount })]).toEqual([16]);
    });

    it('should reject fields outside their width', () => {
      expect(() =>
        encodePerpInstruction({ kind: PerpInstruction.AddPage, instanceIndex: 256 })
      ).toThrow('instanceIndex: expected an integer between 0 and 255, got 256');

      expect(() =>
        encodePerpInstruction({ kind: PerpInstruction.TransferPosition, positionIndex: -1 })
      ).toThrow('positionIndex: expected an integer between 0 and 65535, got -1');

      expect(() =>
        encodePerpInstruction({
          kind: PerpInstruction.ChangeK,
          factor: new BN(1).shln(64),
        })
      ).toThrow('factor: 18446744073709551616 does not fit in a u64');
    });

    it('should reject invalid market symbols', () => {
      expect(() =>
        encodePerpInstruction({
          kind: PerpInstruction.CreateMarket,
          signerNonce: 0,
          marketSymbol: 'BAD\udc00',
          initialVPcAmount: new BN(1),
          coinDecimals: 0,
          quoteDecimals: 0,
        })
      ).toThrow('marketSymbol: string is not valid UTF-8');
    });
  });

  describe('decodePerpInstruction', () => {
    it('should decode what was encoded for every kind', () => {
      for (const sample of SAMPLES) {
        const decoded = decodePerpInstruction(encodePerpInstruction(sample));
        expect(normalize(decoded)).toEqual(normalize(sample));
      }
    });

    it('should decode the CollectGarbage example', () => {
      const decoded = decodePerpInstruction(Buffer.from([8, 0, 5, 0, 0, 0, 0, 0, 0, 0]));
      expect(normalize(decoded)).toEqual({
        kind: PerpInstruction.CollectGarbage,
        instanceIndex: 0,
        maxIterations: '5',
      });
    });

    it('should reject unknown discriminators', () => {
      expect(() => decodePerpInstruction(Buffer.from([18]))).toThrow(
        'unknown instruction discriminator 18'
      );
    });

    it('should reject empty data', () => {
      expect(() => decodePerpInstruction(Buffer.alloc(0))).toThrow(
        'discriminator: need 1 byte(s) at offset 0, buffer has 0'
      );
    });

    it('should reject truncated payloads', () => {
      expect(() => decodePerpInstruction(Buffer.from([4, 1, 2]))).toThrow(
        'amount: need 8 byte(s) at offset 1, buffer has 3'
      );
    });

    it('should reject trailing bytes', () => {
      expect(() => decodePerpInstruction(Buffer.from([10, 0]))).toThrow(
        '1 trailing byte(s) after offset 1'
      );
    });

    it('should reject unknown position sides', () => {
      const data = encodePerpInstruction(SAMPLES[3]);
      data[1] = 2;
      expect(() => decodePerpInstruction(data)).toThrow(EncodingError);
      expect(() => decodePerpInstruction(data)).toThrow('side: unknown position side 2');
    });
  });
});
