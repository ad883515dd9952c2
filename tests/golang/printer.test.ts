/**
 * Unit tests for the source printer and the format entry point
 */

import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { Printer, printSource } from '../../src/golang/printer.js';
import { GoSyntaxError, formatSource } from '../../src/golang/index.js';

const grammarSource = readFileSync(new URL('../fixtures/grammar.go', import.meta.url), 'utf-8');

function lines(...source: string[]): string {
  return `${source.join('\n')}\n`;
}

describe('Printer', () => {
  it('should indent one tab per open block with case labels at switch level', () => {
    const source = lines(
      'package p',
      '',
      'func f(x int) int {',
      'switch x {',
      '    case 1:',
      '  return 1',
      'default:',
      'return 0',
      '}',
      '}'
    );

    expect(printSource(source)).toBe(
      lines(
        'package p',
        '',
        'func f(x int) int {',
        '\tswitch x {',
        '\tcase 1:',
        '\t\treturn 1',
        '\tdefault:',
        '\t\treturn 0',
        '\t}',
        '}'
      )
    );
  });

  it('should collapse blank lines and drop them at block and file edges', () => {
    const source = '\n\npackage p\n\n\n\nimport "fmt"\nfunc g() {\n\n\tfmt.Println()\n\n\n\tfmt.Println()\n\n}\n\n\n';

    expect(printSource(source)).toBe(
      lines('package p', '', 'import "fmt"', 'func g() {', '\tfmt.Println()', '', '\tfmt.Println()', '}')
    );
  });

  it('should collapse runs of spaces between tokens', () => {
    expect(printSource('package p\nvar   x  =   f(a,  b)\n')).toBe('package p\nvar x = f(a, b)\n');
  });

  it('should keep tokens that touch in the source together', () => {
    expect(printSource('package p\nvar y=x+1\n')).toBe('package p\nvar y=x+1\n');
  });

  it('should drop spaces inside brackets and before calls and commas', () => {
    expect(printSource('package p\nvar x = f( a ,b )[ 1 ]\n')).toBe('package p\nvar x = f(a, b)[1]\n');
  });

  it('should drop the space before a parameter list', () => {
    const source = lines('package p', '', 'func TestFunc () string {', '    return "x"', '}');

    expect(printSource(source)).toBe(lines('package p', '', 'func TestFunc() string {', '\treturn "x"', '}'));
  });

  it('should keep the space before a method receiver only', () => {
    expect(printSource('package p\n\nfunc (t T) M () {}\n')).toBe('package p\n\nfunc (t T) M() {}\n');
    expect(printSource('package p\n\nvar f = func () {}\n')).toBe('package p\n\nvar f = func() {}\n');
  });

  it('should keep the space of a dot import', () => {
    const source = lines('package p', '', 'import . "math"');

    expect(printSource(source)).toBe(source);
  });

  it('should align the keys and values of a composite literal', () => {
    const source = lines('package p', '', 'var m = map[string]int{', '"a": 1,', '"bbb": 2,', '}');

    expect(printSource(source)).toBe(
      lines('package p', '', 'var m = map[string]int{', '\t"a":   1,', '\t"bbb": 2,', '}')
    );
  });

  it('should not align keys of very different sizes', () => {
    const longKey = `"${'x'.repeat(48)}"`;
    const source = lines('package p', '', 'var m = map[string]int{', '"a": 1,', `${longKey}: 2,`, '"b": 3,', '}');

    expect(printSource(source)).toBe(
      lines('package p', '', 'var m = map[string]int{', '\t"a": 1,', `\t${longKey}: 2,`, '\t"b": 3,', '}')
    );
  });

  it('should align struct field names, types and tags', () => {
    const source = lines(
      'package p',
      '',
      'type T struct {',
      'ID string `json:"id"` // identifier   ',
      'Count int `json:"count"`',
      'Labels    map[string]string',
      '',
      'Embedded',
      'X int',
      '}'
    );

    expect(printSource(source)).toBe(
      lines(
        'package p',
        '',
        'type T struct {',
        '\tID     string `json:"id"` // identifier',
        '\tCount  int    `json:"count"`',
        '\tLabels map[string]string',
        '',
        '\tEmbedded',
        '\tX int',
        '}'
      )
    );
  });

  it('should align nested struct fields separately', () => {
    const source = lines(
      'package p',
      'type U struct {',
      '\tinner struct {',
      '\t\ta int',
      '\t\tbb string',
      '\t}',
      '\tn int',
      '}'
    );

    expect(printSource(source)).toBe(
      lines(
        'package p',
        'type U struct {',
        '\tinner struct {',
        '\t\ta  int',
        '\t\tbb string',
        '\t}',
        '\tn int',
        '}'
      )
    );
  });

  it('should keep raw strings and block comments verbatim', () => {
    const source = lines('/*', '  header', '*/', 'package p', '', 'var s = `line one', '    keep   spacing', '`');

    expect(printSource(source)).toBe(source);
  });

  it('should return an empty string for empty input', () => {
    expect(printSource('')).toBe('');
    expect(printSource('\n\n')).toBe('');
  });

  it('should be idempotent', () => {
    const printer = new Printer();
    const once = printer.print(grammarSource);

    expect(printer.print(once)).toBe(once);
  });

  it('should leave canonical source unchanged', () => {
    expect(printSource(grammarSource)).toBe(grammarSource);
  });
});

describe('formatSource', () => {
  it('should validate before printing', () => {
    expect(() => formatSource('package p\nfunc {\n')).toThrow(GoSyntaxError);
  });

  it('should format well-formed source', () => {
    expect(formatSource('package p\n\n\nvar  x = 1')).toBe('package p\n\nvar x = 1\n');
  });
});
