/**
 * Text Renderer Tests
 */

import { describe, it, expect } from 'vitest';
import { localName } from '../../../src/document/accessors.js';
import { RenderContext, TextRenderer, Traverser } from '../../../src/renderer/index.js';
import { STARS_ORNAMENT } from '../../../src/renderer/core/constants.js';
import { element } from '../../helpers/test-utils.js';

function setup(lineWidth = 72) {
  const renderer = new TextRenderer({ lineWidth });
  const traverser = new Traverser(renderer);
  const root = renderer.createRootContext().withParent('TEI');
  const section = (name: 'front' | 'body' | 'back'): RenderContext =>
    root.withParent(name).withSection(name);
  /** Context of an element inside a top-level division */
  const inDivision = section('body').withDeeperDivision().withParent('div');

  /** Render an element the way a section traversal would */
  const renderTop = (xml: string, name: 'front' | 'body' | 'back' = 'body'): readonly string[] => {
    const el = element(xml);
    return traverser.traverseElement(el, section(name).withParent(localName(el), el.attributes.rend ?? ''));
  };
  /** Render an element as a child of a top-level division */
  const renderInDivision = (xml: string): readonly string[] =>
    traverser.traverseElement(element(xml), inDivision);

  return { renderer, traverser, inDivision, renderTop, renderInDivision };
}

describe('TextRenderer', () => {
  it('should carry its line width in the root context', () => {
    expect(new TextRenderer({ lineWidth: 40 }).createRootContext().lineWidth).toBe(40);
    expect(new TextRenderer().createRootContext().lineWidth).toBe(72);
  });

  describe('end to end', () => {
    it('should render a body division with heading and emphasis', () => {
      const { renderTop } = setup();
      const lines = renderTop(
        '<div><head>Chapter One</head><p>Hello <hi rend="italic">world</hi>.</p></div>',
      );
      expect(lines).toEqual(['', '', '', 'CHAPTER ONE', '', '', 'Hello _world_.', '']);
    });
  });

  describe('headings', () => {
    it('should underline front-matter headings', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><head>Preface</head></div>', 'front')).toEqual([
        'Preface',
        '=======',
        '',
      ]);
    });

    it('should upper-case back-matter headings with one blank line', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><head>Notes</head></div>', 'back')).toEqual(['NOTES', '']);
    });

    it('should render nested-division headings with two blank lines', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><div><head>Part</head></div></div>')).toEqual(['PART', '', '']);
    });

    it('should render nothing for a heading in any other context', () => {
      const { renderer, traverser, inDivision } = setup();
      const head = element('<head>A plate</head>');
      expect(renderer.renderElement(head, 'head', inDivision.withParent('figure'), traverser)).toEqual(
        [],
      );
    });

    it('should leave figure captions to the figure handler', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<figure><head>A plate</head></figure>')).toEqual([
        '[Illustration: A plate]',
        '',
      ]);
    });

    it('should skip empty headings', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><head> </head><p>x</p></div>')).toEqual(['x', '']);
    });
  });

  describe('paragraphs', () => {
    it('should wrap to the line width', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<p>one two three four five six</p>')).toEqual([
        'one two three four',
        'five six',
        '',
      ]);
    });

    it('should break lines at lb', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p>first line<lb/>second</p>')).toEqual(['first line', 'second', '']);
    });

    it('should render nothing for an empty paragraph', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p>  </p>')).toEqual([]);
    });

    it('should render notes, references and other inline markup', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<p>See<note>a  remark</note> <ref target="#x">here</ref>, <title>Book</title> and <foreign>res</foreign><name>!</name></p>',
        ),
      ).toEqual(['See [a remark] here, _Book_ and _res_!', '']);
    });

    it('should drop empty emphasis', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p>a<hi/>b</p>')).toEqual(['ab', '']);
    });
  });

  describe('quotations', () => {
    it('should alternate quotation marks by depth', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p><quote>A<quote>B</quote>C</quote></p>')).toEqual([
        '“A‘B’C”',
        '',
      ]);
    });

    it('should indent block quotations and deepen their quotes', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<quote><p>He said <quote>hi</quote>.</p></quote>')).toEqual([
        '    He said ‘hi’.',
        '',
      ]);
    });

    it('should wrap a block quotation without block children as one paragraph', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<quote>Short saying</quote>')).toEqual(['    Short saying', '']);
    });

    it('should render a quotation under an inline parent on one line', () => {
      const { renderer, traverser } = setup();
      const quote = element('<quote>Short<lb/>saying</quote>');
      expect(renderer.renderQuote(quote, new RenderContext({ parentTag: 'item' }), traverser)).toEqual([
        '“Short saying”',
      ]);
    });

    it('should indent nested block quotations twice', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<quote><quote><p>Deep</p></quote></quote>')).toEqual([
        '        Deep',
        '',
      ]);
    });
  });

  describe('verse', () => {
    it('should indent lines by their style', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><l>First line</l><l rend="indent">Second</l></lg>')).toEqual([
        '    First line',
        '      Second',
        '',
      ]);
    });

    it('should render a verse title', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><head>Song</head><l>La</l></lg>')).toEqual([
        '    SONG',
        '',
        '    La',
        '',
      ]);
    });

    it('should center a group as a block', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<lg rend="center"><l>ab</l><l>abcdef</l></lg>')).toEqual([
        '       ab',
        '       abcdef',
        '',
      ]);
    });

    it('should center individual lines', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<lg><l rend="center">mid</l></lg>')).toEqual(['        mid', '']);
    });

    it('should separate stanzas with blank lines', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><lg><l>a</l></lg><lg><l>b</l></lg></lg>')).toEqual([
        '    a',
        '',
        '    b',
        '',
        '',
      ]);
    });

    it('should keep empty lines', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><l/></lg>')).toEqual(['', '']);
    });
  });

  describe('lists and tables', () => {
    it('should bullet list items', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<list><item>Apples</item><item>Pears</item></list>')).toEqual([
        '  • Apples',
        '  • Pears',
        '',
      ]);
    });

    it('should keep bullets and whole words in deeply quoted lists', () => {
      const { renderInDivision } = setup(40);
      const xml =
        '<quote>'.repeat(10) +
        '<list><item>alpha beta gamma delta</item></list>' +
        '</quote>'.repeat(10);

      expect(renderInDivision(xml)).toEqual([
        `${' '.repeat(18)}• alpha beta gamma`,
        `${' '.repeat(20)}delta`,
        '',
      ]);
    });

    it('should hang wrapped list items', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<list><item>one two three four five</item></list>')).toEqual([
        '  • one two three',
        '    four five',
        '',
      ]);
    });

    it('should align table columns', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<table><row><cell>Name</cell><cell>Age</cell></row><row><cell>Al</cell><cell>7</cell></row></table>',
        ),
      ).toEqual(['  Name  Age', '  Al    7', '']);
    });
  });

  describe('figures, milestones and signatures', () => {
    it('should mark a figure without caption', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<figure><graphic url="p.png"/></figure>')).toEqual([
        '[Illustration]',
        '',
      ]);
    });

    it('should center a stars milestone', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<milestone rend="stars"/>')).toEqual([
        ' '.repeat(19) + STARS_ORNAMENT,
        '',
      ]);
    });

    it('should render a plain milestone as spacing', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<milestone/>')).toEqual(['', '']);
      expect(renderInDivision('<milestone rend-html="none"/>')).toEqual(['', '']);
    });

    it('should honour a text-specific style override', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<milestone rend="stars" rend-text="none"/>')).toEqual([]);
    });

    it('should right-align signatures', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<signed>A. Writer</signed>')).toEqual([
        ' '.repeat(11) + 'A. Writer',
        '',
      ]);
    });

    it('should wrap a signature wider than the line', () => {
      const { renderInDivision } = setup(20);
      expect(renderInDivision('<signed>Your most obedient servant</signed>')).toEqual([
        'Your most obedient',
        'servant',
        '',
      ]);
    });
  });

  describe('unrecognized tags', () => {
    it('should render flattened text', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<sp>Some  <hi>speech</hi></sp>')).toEqual(['Some speech', '']);
    });

    it('should render nothing without text', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<sp/>')).toEqual([]);
    });
  });

  describe('inline markup in titles, cells and captions', () => {
    it('should keep quotation glyphs in headings', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><head>The <quote>Lost</quote> Ring</head></div>')).toEqual([
        '',
        '',
        '',
        'THE “LOST” RING',
        '',
        '',
      ]);
    });

    it('should size the front-matter rule by visual length', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><head>A <hi>b</hi></head></div>', 'front')).toEqual([
        'A _b_',
        '===',
        '',
      ]);
    });

    it('should keep quotation glyphs in verse titles', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><head>The <quote>Song</quote></head><l>x</l></lg>')).toEqual([
        '    THE “SONG”',
        '',
        '    x',
        '',
      ]);
    });

    it('should keep markup in table cells and align by visual length', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<table><row><cell>He said <quote>no</quote></cell><cell>1</cell></row>' +
            '<row><cell><hi>Al</hi></cell><cell>2</cell></row></table>',
        ),
      ).toEqual(['  He said “no”  1', `  _Al_${' '.repeat(10)}  2`, '']);
    });

    it('should keep quotation glyphs in figure captions', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<figure><head>A <quote>plate</quote></head></figure>')).toEqual([
        '[Illustration: A “plate”]',
        '',
      ]);
    });
  });
});
