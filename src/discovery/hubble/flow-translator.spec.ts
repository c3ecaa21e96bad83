import { FlowTranslator } from './flow-translator';

describe('FlowTranslator', () => {
  const link = { id: 'web-db', source_node_id: 'web' };

  it('counts forwarded flows from the source node as tx and the rest as rx', () => {
    const translator = new FlowTranslator(1500);

    expect(translator.record(link, 'web', 'FORWARDED')).toBe(true);
    expect(translator.record(link, 'web', 'FORWARDED')).toBe(true);
    expect(translator.record(link, 'db', 'FORWARDED')).toBe(true);

    expect(translator.samples(1_000)).toEqual([
      {
        kind: 'counters',
        iface: 'hubble:web-db',
        linkId: 'web-db',
        rxBytes: 1500,
        txBytes: 3000,
        rxPackets: 1,
        txPackets: 2,
        timestamp: 1_000,
      },
    ]);
  });

  it('ignores verdicts other than FORWARDED', () => {
    const translator = new FlowTranslator(1500);

    expect(translator.record(link, 'web', 'DROPPED')).toBe(false);
    expect(translator.record(link, 'web', 'AUDIT')).toBe(false);
    expect(translator.trackedLinks).toBe(0);
    expect(translator.samples(1_000)).toEqual([]);
  });

  it('keeps emitting cumulative samples without new flows', () => {
    const translator = new FlowTranslator(100);
    translator.record(link, 'web', 'FORWARDED');

    const [first] = translator.samples(1_000);
    const [second] = translator.samples(2_000);

    expect(second?.txBytes).toBe(first?.txBytes);
    expect(second?.timestamp).toBe(2_000);
  });

  it('drops counters of links no longer in the topology', () => {
    const translator = new FlowTranslator(100);
    translator.record(link, 'web', 'FORWARDED');
    translator.record({ id: 'web-cache', source_node_id: 'web' }, 'web', 'FORWARDED');

    translator.retain(new Set(['web-cache']));

    expect(translator.samples(1_000).map((sample) => sample.linkId)).toEqual(['web-cache']);
  });
});
