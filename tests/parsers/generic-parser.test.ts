import { describe, it, expect } from 'vitest';
import { openDocument } from '@bankstmt/pdf-extract';
import { GenericStatementParser, parseGenericLine } from '@bankstmt/statement-parser';
import { FakePdf, fakeLoader } from '../helpers/fake-pdf.js';

describe('parseGenericLine', () => {
  it('should read date, description, amount and balance', () => {
    expect(parseGenericLine('2024-01-05\tCOFFEE SHOP\t-45.00\t1,200.00')).toEqual({
      'transaction date': '2024-01-05',
      description: 'COFFEE SHOP',
      'transaction amount': '-45.00',
      'account balance': '1,200.00',
    });
  });

  it('should leave out the balance when the row has none', () => {
    expect(parseGenericLine('2024年1月31日 SALARY ACME LTD 5,000.00')).toEqual({
      'transaction date': '2024年1月31日',
      description: 'SALARY ACME LTD',
      'transaction amount': '5,000.00',
    });
  });

  it('should collapse runs of whitespace in the description', () => {
    expect(parseGenericLine('05/01/2024 CARD   PAYMENT 10.00')?.['description']).toBe('CARD PAYMENT');
  });

  it('should ignore lines that are not transactions', () => {
    expect(parseGenericLine('Statement period 2024-01-01 to 2024-01-31')).toBeNull();
    expect(parseGenericLine('2024-01-05 no amount here')).toBeNull();
    expect(parseGenericLine('')).toBeNull();
  });
});

describe('GenericStatementParser', () => {
  it('should collect transaction rows from every page', async () => {
    const pdf = new FakePdf([
      ['Generic Bank statement', '2024-01-05 COFFEE -4.50 995.50'],
      ['2024-01-06 REFUND 10.00 1,005.50', 'Page 2 of 2'],
    ]);
    const document = await openDocument('/in/generic.pdf', fakeLoader({ '/in/generic.pdf': pdf }));

    const records = await new GenericStatementParser().parse(document);
    await document.close();

    expect(records).toEqual([
      {
        'transaction date': '2024-01-05',
        description: 'COFFEE',
        'transaction amount': '-4.50',
        'account balance': '995.50',
      },
      {
        'transaction date': '2024-01-06',
        description: 'REFUND',
        'transaction amount': '10.00',
        'account balance': '1,005.50',
      },
    ]);
  });
});
