import { describe, expect, it } from 'vitest';

import { parseEthLines, parseFcLines, parseManagedSystemLines } from '../parse';

describe('hmc parseFcLines', () => {
  it('parses one LPAR with two WWPNs in order', () => {
    const text = 'lparA;5001438000000001,5001438000000002\n';
    expect(parseFcLines(text.split('\n'))).toEqual([
      { lpar: 'lparA', wwpns: ['50:01:43:80:00:00:00:01', '50:01:43:80:00:00:00:02'] },
    ]);
  });

  it('skips lines without a separator and dedupes WWPNs keeping first occurrence', () => {
    const lines = [
      '',
      'no separator here',
      'db01;c0507601a2b30006,C0:50:76:01:A2:B3:00:04,c0507601a2b30006',
    ];

    const records = parseFcLines(lines);
    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({ lpar: 'db01', wwpns: ['C0:50:76:01:A2:B3:00:06', 'C0:50:76:01:A2:B3:00:04'] });
  });

  it('splits only on the first separator and ignores blank tokens', () => {
    expect(parseFcLines(['app01;c0507601a2b30008,, ;c0507601a2b3000a'])).toEqual([
      { lpar: 'app01', wwpns: ['C0:50:76:01:A2:B3:00:08', 'C0:50:76:01:A2:B3:00:0A'] },
    ]);
  });

  it('drops HMC empty markers and quotes', () => {
    expect(parseFcLines(['vios1;none', 'web01;"c0507601a2b3000c,c0507601a2b3000d"'])).toEqual([
      { lpar: 'vios1', wwpns: [] },
      { lpar: 'web01', wwpns: ['C0:50:76:01:A2:B3:00:0C', 'C0:50:76:01:A2:B3:00:0D'] },
    ]);
  });

  it('skips records with an empty LPAR name', () => {
    expect(parseFcLines([';c0507601a2b3000c'])).toEqual([]);
  });
});

describe('hmc parseEthLines', () => {
  it('splits addresses on commas and whitespace runs', () => {
    expect(parseEthLines(['db01;fa163e5b0c01, fa163e5b0c02  FA163E5B0C01'])).toEqual([
      { lpar: 'db01', macs: ['FA:16:3E:5B:0C:01', 'FA:16:3E:5B:0C:02'] },
    ]);
  });

  it('skips lines without a separator', () => {
    expect(parseEthLines(['lpar_name', 'app01;null'])).toEqual([{ lpar: 'app01', macs: [] }]);
  });
});

describe('hmc parseManagedSystemLines', () => {
  it('trims, drops blanks and dedupes', () => {
    expect(parseManagedSystemLines(['Server-9009-42A-SN7800001', '  ', ' p10-east ', 'p10-east'])).toEqual([
      'Server-9009-42A-SN7800001',
      'p10-east',
    ]);
  });
});
