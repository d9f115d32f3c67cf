import { describe, expect, test } from 'vitest';

import { plainRatioScorer, tokenSetScorer } from './similarity';

describe('tokenSetScorer', () => {
  test('scores 100 when every name token appears in the page', () => {
    const page =
      'RECIBO MENSAL FUNCIONARIO SILVA JOAO CARGO ANALISTA SALARIO BASE';

    expect(tokenSetScorer(page, 'JOAO SILVA')).toBe(100);
  });

  test('ignores case and punctuation', () => {
    expect(tokenSetScorer('nome: joao, silva.', 'JOAO SILVA')).toBe(100);
  });

  test('scores unrelated text below any practical threshold', () => {
    expect(tokenSetScorer('XYZ QWV', 'JOAO SILVA')).toBeLessThan(50);
  });

  test('is deterministic', () => {
    const page = 'JOA0 SILVA RECIBO';

    expect(tokenSetScorer(page, 'JOAO SILVA')).toBe(
      tokenSetScorer(page, 'JOAO SILVA'),
    );
  });
});

describe('plainRatioScorer', () => {
  test('scores identical strings 100', () => {
    expect(plainRatioScorer('MARIA SOUZA', 'MARIA SOUZA')).toBe(100);
  });

  test('penalizes surrounding text that tokenSetScorer ignores', () => {
    const page = 'RECIBO MENSAL FUNCIONARIO MARIA SOUZA CARGO ANALISTA';

    expect(plainRatioScorer(page, 'MARIA SOUZA')).toBeLessThan(
      tokenSetScorer(page, 'MARIA SOUZA'),
    );
  });
});
