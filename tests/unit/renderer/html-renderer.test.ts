/**
 * HTML Renderer Tests
 */

import { describe, it, expect } from 'vitest';
import { localName } from '../../../src/document/accessors.js';
import {
  HtmlRenderer,
  resolveReference,
  Traverser,
  type HtmlRendererOptions,
} from '../../../src/renderer/index.js';
import { convertToHtml } from '../../../src/convert/index.js';
import { element, teiDocument } from '../../helpers/test-utils.js';

function setup(options: HtmlRendererOptions = {}) {
  const renderer = new HtmlRenderer(options);
  const traverser = new Traverser(renderer);
  const body = renderer.createRootContext().withParent('TEI').withParent('body').withSection('body');
  const inDivision = body.withDeeperDivision().withParent('div');

  const renderTop = (xml: string): string => {
    const el = element(xml);
    return traverser.traverseElement(el, body.withParent(localName(el), el.attributes.rend ?? ''));
  };
  const renderInDivision = (xml: string): string => traverser.traverseElement(element(xml), inDivision);

  return { renderer, traverser, inDivision, renderTop, renderInDivision };
}

describe('resolveReference', () => {
  const idMap = new Map([['ch1', 'chapter1']]);

  it('should point identifiers into their file', () => {
    expect(resolveReference('ch1', idMap)).toBe('chapter1#ch1');
  });

  it('should fall back to a fragment for unknown identifiers', () => {
    expect(resolveReference('unknown', idMap)).toBe('#unknown');
    expect(resolveReference('ch1', null)).toBe('#ch1');
  });

  it('should pass through absolute urls and fragments', () => {
    expect(resolveReference('https://example.com', idMap)).toBe('https://example.com');
    expect(resolveReference('mailto:someone@example.com', idMap)).toBe(
      'mailto:someone@example.com',
    );
    expect(resolveReference('//example.com/x', idMap)).toBe('//example.com/x');
    expect(resolveReference('#ch1', idMap)).toBe('#ch1');
  });
});

describe('HtmlRenderer', () => {
  describe('divisions and headings', () => {
    it('should wrap a division with its id and type', () => {
      const { renderTop } = setup();
      expect(
        renderTop('<div xml:id="c1" type="chapter"><head>One</head><p>Text</p></div>'),
      ).toBe('<div id="c1" class="chapter">\n<h2>One</h2>\n<p>Text</p>\n</div>\n');
    });

    it('should deepen heading levels with nesting', () => {
      const { renderTop } = setup();
      expect(renderTop('<div><div><head>Sub</head></div></div>')).toBe(
        '<div>\n<div>\n<h3>Sub</h3>\n</div>\n</div>\n',
      );
    });

    it('should not go beyond h6', () => {
      const { renderTop } = setup();
      const html = renderTop(
        '<div><div><div><div><div><div><div><head>Deep</head></div></div></div></div></div></div></div>',
      );
      expect(html).toContain('<h6>Deep</h6>');
    });

    it('should render nothing for a heading outside a division', () => {
      const { renderer, traverser, inDivision } = setup();
      const head = element('<head>Caption</head>');
      expect(renderer.renderElement(head, 'head', inDivision.withParent('figure'), traverser)).toBe(
        '',
      );
    });
  });

  describe('inline markup', () => {
    it('should map emphasis styles', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<p>Hello <hi rend="italic">world</hi>, <hi rend="bold">b</hi> <hi rend="small-caps">sc</hi> <hi>d</hi></p>',
        ),
      ).toBe('<p>Hello <i>world</i>, <b>b</b> <span class="small-caps">sc</span> <i>d</i></p>');
    });

    it('should map emph, title, foreign and note', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<p><emph>e</emph><title>t</title><foreign>f</foreign><note>n</note></p>',
        ),
      ).toBe('<p><em>e</em><i>t</i><i>f</i><sup>[n]</sup></p>');
    });

    it('should render line breaks as void elements', () => {
      expect(setup().renderInDivision('<p>a<lb/>b</p>')).toBe('<p>a<br>b</p>');
      expect(setup({ strictOutput: true }).renderInDivision('<p>a<lb/>b</p>')).toBe(
        '<p>a<br />b</p>',
      );
    });

    it('should link references and drop empty targets', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p><ref target="https://example.com">x</ref><ref>y</ref></p>')).toBe(
        '<p><a href="https://example.com">x</a>y</p>',
      );
    });

    it('should resolve references through the context id map', () => {
      const { renderer, traverser, inDivision } = setup();
      const ctx = inDivision.withIdMap(new Map([['ch2', 'chapter2.xhtml']]));
      expect(traverser.traverseElement(element('<p><ref target="ch2">x</ref></p>'), ctx)).toBe(
        '<p><a href="chapter2.xhtml#ch2">x</a></p>',
      );
      expect(renderer.formatName).toBe('html');
    });

    it('should flatten unknown inline elements', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p rend="center">x<name>Bo<hi>b</hi></name></p>')).toBe(
        '<p class="center">xBob</p>',
      );
    });

    it('should render unrecognized blocks inline', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<sp>x<hi>y</hi></sp>')).toBe('x<i>y</i>');
    });
  });

  describe('quotations', () => {
    it('should alternate quotation marks by depth', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<p><quote>A<quote>B</quote>C</quote></p>')).toBe('<p>“A‘B’C”</p>');
    });

    it('should render block quotations around their blocks', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<quote><p>a <quote>b</quote></p></quote>')).toBe(
        '<blockquote>\n<p>a ‘b’</p>\n</blockquote>',
      );
    });

    it('should wrap bare quotation text in a paragraph', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<quote>Just text</quote>')).toBe(
        '<blockquote><p>Just text</p></blockquote>',
      );
    });

    it('should not add section newlines inside a top-level block quotation', () => {
      const { renderTop } = setup();
      expect(renderTop('<quote><p>Q</p></quote>')).toBe('<blockquote>\n<p>Q</p>\n</blockquote>\n');
    });
  });

  describe('strict output', () => {
    const xml = '<p>Fish &amp; "chips" &lt;b&gt;</p>';

    it('should escape text in strict mode', () => {
      expect(setup({ strictOutput: true }).renderInDivision(xml)).toBe(
        '<p>Fish &amp; &quot;chips&quot; &lt;b&gt;</p>',
      );
    });

    it('should escape only markup characters otherwise', () => {
      expect(setup().renderInDivision(xml)).toBe('<p>Fish &amp; "chips" &lt;b&gt;</p>');
    });

    it('should keep attribute values quoted otherwise', () => {
      expect(setup().renderInDivision('<p><ref target="a&quot;b">x</ref></p>')).toBe(
        '<p><a href="#a&quot;b">x</a></p>',
      );
    });

    it('should be deterministic', () => {
      const doc = teiDocument({ body: '<div><head>H</head><p>a &amp; b</p></div>' });
      expect(convertToHtml(doc, { strictOutput: true })).toBe(
        convertToHtml(doc, { strictOutput: true }),
      );
    });
  });

  describe('verse, lists and tables', () => {
    it('should render a poem with title and styled lines', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision('<lg rend="center"><head>Song</head><l>One</l><l rend="indent">Two</l></lg>'),
      ).toBe(
        [
          '<div class="poem center">',
          '  <div class="poem-title">Song</div>',
          '  <div class="line">One</div>',
          '  <div class="line indent">Two</div>',
          '</div>',
        ].join('\n'),
      );
    });

    it('should render stanzas', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<lg><lg><l>a</l></lg></lg>')).toBe(
        [
          '<div class="poem">',
          '  <div class="stanza">',
          '    <div class="line">a</div>',
          '  </div>',
          '</div>',
        ].join('\n'),
      );
    });

    it('should render lists', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<list><item>A</item><item>B</item></list>')).toBe(
        '<ul>\n  <li>A</li>\n  <li>B</li>\n</ul>',
      );
    });

    it('should render label cells as headers', () => {
      const { renderInDivision } = setup();
      expect(
        renderInDivision(
          '<table><row><cell role="label">H</cell></row><row><cell>v</cell></row></table>',
        ),
      ).toBe(
        [
          '<table>',
          '  <tr>',
          '    <th>H</th>',
          '  </tr>',
          '  <tr>',
          '    <td>v</td>',
          '  </tr>',
          '</table>',
        ].join('\n'),
      );
    });
  });

  describe('figures, milestones and signatures', () => {
    const figure =
      '<figure rend="left"><graphic url="img/p1.png" width="50%"/><figDesc>A  plate</figDesc><head>Plate <hi>one</hi></head></figure>';

    it('should render a figure with image, alt text and caption', () => {
      expect(setup().renderInDivision(figure)).toBe(
        [
          '<figure class="left" style="width: 50%;">',
          '  <img src="img/p1.png" alt="A plate">',
          '  <figcaption>Plate <i>one</i></figcaption>',
          '</figure>',
        ].join('\n'),
      );
    });

    it('should substitute mapped image sources', () => {
      const { renderInDivision } = setup({
        strictOutput: true,
        imageMap: new Map([['img/p1.png', 'images/p1.png']]),
      });
      expect(renderInDivision(figure)).toContain('  <img src="images/p1.png" alt="A plate" />');
    });

    it('should render milestones by style', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<milestone rend="stars"/>')).toBe(
        '<div class="milestone stars"></div>',
      );
      expect(renderInDivision('<milestone/>')).toBe('<div class="milestone space"></div>');
      expect(renderInDivision('<milestone rend="stars" rend-html="none"/>')).toBe('');
    });

    it('should render signatures', () => {
      const { renderInDivision } = setup();
      expect(renderInDivision('<signed>A. Writer</signed>')).toBe(
        '<div class="signature">A. Writer</div>',
      );
    });
  });

  describe('document framing', () => {
    const doc = teiDocument({ title: 'T &amp; U', body: '<p>One</p><p>Two</p>' });

    it('should open with doctype, language, metadata and title', () => {
      const html = convertToHtml(doc);
      expect(html.startsWith('<!DOCTYPE html>\n<html lang="en">\n<head>\n  <meta charset="UTF-8">\n')).toBe(
        true,
      );
      expect(html).toContain('  <title>T &amp; U</title>\n');
    });

    it('should end every top-level block with a newline', () => {
      expect(convertToHtml(doc).endsWith(
        '<body>\n<h1>T &amp; U</h1>\n<p>One</p>\n<p>Two</p>\n</body>\n</html>\n',
      )).toBe(true);
    });

    it('should close meta tags in strict mode', () => {
      expect(convertToHtml(doc, { strictOutput: true })).toContain('  <meta charset="UTF-8" />\n');
    });

    it('should embed custom styles after the defaults', () => {
      const html = convertToHtml(doc, { customCss: 'p { color: red; }\n\nh2 { margin: 0; }' });
      expect(html).toContain(
        '\n\n    /* Custom styles */\n    p { color: red; }\n\n    h2 { margin: 0; }\n  </style>\n',
      );
    });
  });
});
