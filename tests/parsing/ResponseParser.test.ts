import { parseTerms } from '../../src/services/parsing/ResponseParser.js';
import { EmptyExtractionResult } from '../../src/utils/errors.js';
import type { TermRecord } from '../../src/types/terms.types.js';

describe('parseTerms', () => {
  it('reads numbered pipe lines', () => {
    expect(parseTerms('1. 服务器|Server\n2. 数据库|Database\n')).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 2, sourceTerm: '数据库', targetTerm: 'Database' },
    ]);
  });

  it('reads a markdown table and skips its header and separator', () => {
    const raw = [
      '| # | 中文 | English |',
      '|---|---|---|',
      '| 1 | 服务器 | Server |',
      '| 2 | 数据库 | Database |',
    ].join('\n');

    expect(parseTerms(raw)).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 2, sourceTerm: '数据库', targetTerm: 'Database' },
    ]);
  });

  it('drops header rows made of column names', () => {
    expect(parseTerms('中文|English\n服务器|Server')).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
    ]);
  });

  it('numbers records without an ordinal after the previous one', () => {
    expect(parseTerms('5|服务器|Server\n数据库|Database')).toEqual([
      { sequenceIndex: 5, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 6, sourceTerm: '数据库', targetTerm: 'Database' },
    ]);
  });

  it('skips prose, code fences and bullets around the pairs', () => {
    const raw = [
      'Here are the terms I found:',
      '```',
      '- 1|服务器|Server',
      '* 2|数据库|Database',
      '```',
      'Let me know if you need more.',
    ].join('\n');

    expect(parseTerms(raw).map(term => term.sourceTerm)).toEqual(['服务器', '数据库']);
  });

  it('mixes delimiters line by line', () => {
    const raw = '1|服务器|Server\n2\t数据库\tDatabase\n3，云计算，Cloud computing';

    expect(parseTerms(raw)).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 2, sourceTerm: '数据库', targetTerm: 'Database' },
      { sequenceIndex: 3, sourceTerm: '云计算', targetTerm: 'Cloud computing' },
    ]);
  });

  it('keeps numbered pairs without Chinese characters', () => {
    expect(parseTerms('1|API|API\n2|5G|5G\n3|服务器|Server')).toEqual([
      { sequenceIndex: 1, sourceTerm: 'API', targetTerm: 'API' },
      { sequenceIndex: 2, sourceTerm: '5G', targetTerm: '5G' },
      { sequenceIndex: 3, sourceTerm: '服务器', targetTerm: 'Server' },
    ]);
  });

  it('treats a numbered row of column words as a term', () => {
    expect(parseTerms('1|术语|term\n2|服务器|Server')).toEqual([
      { sequenceIndex: 1, sourceTerm: '术语', targetTerm: 'term' },
      { sequenceIndex: 2, sourceTerm: '服务器', targetTerm: 'Server' },
    ]);
  });

  it('requires a Chinese character in an unnumbered source term', () => {
    expect(parseTerms('API|接口\n接口|Interface')).toEqual([
      { sequenceIndex: 1, sourceTerm: '接口', targetTerm: 'Interface' },
    ]);
  });

  it.each([
    '以下是提取的专业术语，共两个：',
    '本文档介绍了服务器的配置，以及数据库的部署。',
    `${'很长的说明'.repeat(20)}，Server`,
  ])('skips the unnumbered sentence %s', sentence => {
    expect(parseTerms(`${sentence}\n1|服务器|Server\n2|数据库|Database`)).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 2, sourceTerm: '数据库', targetTerm: 'Database' },
    ]);
  });

  it('keeps the first occurrence of a repeated pair', () => {
    expect(parseTerms('1|服务器|Server\n2|服务器|Server\n3|服务器|Host')).toEqual([
      { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      { sequenceIndex: 3, sourceTerm: '服务器', targetTerm: 'Host' },
    ]);
  });

  it('raises EmptyExtractionResult when no line holds a pair', () => {
    const raw = 'Sorry, I could not find any terminology in these documents.';
    let caught: unknown;
    try {
      parseTerms(raw);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EmptyExtractionResult);
    expect(caught).toMatchObject({ rawPreview: raw, stage: 'parsing' });
  });

  it('limits the preview of an unusable reply to 200 characters', () => {
    let caught: unknown;
    try {
      parseTerms('x'.repeat(500));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(EmptyExtractionResult);
    expect(caught).toMatchObject({ rawPreview: 'x'.repeat(200) });
  });

  it('parses back what it would accept, in order', () => {
    const records: TermRecord[] = [
      { sequenceIndex: 1, sourceTerm: '负载均衡', targetTerm: 'load balancing' },
      { sequenceIndex: 2, sourceTerm: '容器', targetTerm: 'container' },
      { sequenceIndex: 3, sourceTerm: '微服务', targetTerm: 'microservice' },
    ];
    const raw = records.map(r => `${r.sequenceIndex}|${r.sourceTerm}|${r.targetTerm}`).join('\n');

    expect(parseTerms(raw)).toEqual(records);
  });

  describe('terminology XML replies', () => {
    it('reads term elements in document order', () => {
      const raw = [
        'Here is the result:',
        '<terminology>',
        '  <term><ZH_CN>服务器</ZH_CN><EN_US>Server</EN_US></term>',
        '  <term><zh_cn>数据库</zh_cn><en_us>Database</en_us></term>',
        '</terminology>',
      ].join('\n');

      expect(parseTerms(raw)).toEqual([
        { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
        { sequenceIndex: 2, sourceTerm: '数据库', targetTerm: 'Database' },
      ]);
    });

    it('reads a single term element', () => {
      expect(parseTerms('<terminology><term><ZH_CN>容器</ZH_CN><EN_US>Container</EN_US></term></terminology>')).toEqual([
        { sequenceIndex: 1, sourceTerm: '容器', targetTerm: 'Container' },
      ]);
    });

    it('falls back to line parsing when the block holds no terms', () => {
      expect(parseTerms('<terminology></terminology>\n1|服务器|Server')).toEqual([
        { sequenceIndex: 1, sourceTerm: '服务器', targetTerm: 'Server' },
      ]);
    });
  });
});
