/**
 * DOT pretty-printer tests.
 */

import { describe, test, expect } from 'vitest'
import fc from 'fast-check'
import { digraph, graph, subgraph, node, edge, html, mergeAttributes } from '../ast'
import { pprint, escapeHtml, htmlAttributes } from '../pprint'

describe('pprint', () => {
  test('prints a directed graph with default attributes before statements', () => {
    const g = digraph('G', [
      node('n1', { label: 'f' }),
      edge([{ name: 'n1', port: 'out1', anchor: 's' }, { name: 'n2', port: 'in1', anchor: 'n' }], { id: 'e1' }),
    ], {
      graphAttrs: { rankdir: 'TB' },
      nodeAttrs: { shape: 'none', width: '0' },
      edgeAttrs: { arrowsize: '0.5' },
    })

    expect(pprint(g)).toBe([
      'digraph G {',
      '  graph [rankdir="TB"];',
      '  node [shape="none",width="0"];',
      '  edge [arrowsize="0.5"];',
      '  n1 [label="f"];',
      '  n1:out1:s -> n2:in1:n [id="e1"];',
      '}',
      '',
    ].join('\n'))
  })

  test('undirected graphs use the -- connective', () => {
    expect(pprint(graph('H', [edge(['a', 'b'])]))).toBe('graph H {\n  a -- b;\n}\n')
  })

  test('omits empty default attribute statements', () => {
    expect(pprint(digraph('G', [node('a')]))).toBe('digraph G {\n  a;\n}\n')
  })

  test('prints anonymous and named subgraphs with nested indentation', () => {
    const g = digraph('G', [
      subgraph([node('p1'), edge(['p1', 'p2', 'p3'])], {
        graphAttrs: { rank: 'source' },
        edgeAttrs: { style: 'invis' },
      }),
      subgraph([node('q')], { name: 'cluster_0' }),
    ])

    expect(pprint(g)).toBe([
      'digraph G {',
      '  {',
      '    graph [rank="source"];',
      '    edge [style="invis"];',
      '    p1;',
      '    p1 -> p2 -> p3;',
      '  }',
      '  subgraph cluster_0 {',
      '    q;',
      '  }',
      '}',
      '',
    ].join('\n'))
  })

  test('HTML labels print between angle brackets, unescaped', () => {
    const n = node('n1', { label: html('<TABLE><TR><TD>f</TD></TR></TABLE>') })
    expect(pprint(n)).toBe('n1 [label=<<TABLE><TR><TD>f</TD></TR></TABLE>>];')
  })

  test('double quotes inside string values are escaped', () => {
    expect(pprint(node('a', { comment: 'say "hi"' }))).toBe('a [comment="say \\"hi\\""];')
  })

  test('edge requires at least two nodes', () => {
    expect(() => edge(['a'])).toThrow(RangeError)
  })
})

describe('escapeHtml', () => {
  test('escapes the five special characters, ampersand first', () => {
    expect(escapeHtml(`<a href="x">Tom & Jerry's</a>`))
      .toBe('&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&#39;s&lt;/a&gt;')
  })

  test('escaped text never contains raw markup characters', () => {
    fc.assert(fc.property(fc.string(), (s) => !/[<>"']/.test(escapeHtml(s))))
  })
})

describe('attribute helpers', () => {
  test('htmlAttributes upper-cases keys', () => {
    expect(htmlAttributes({ border: '1', cellpadding: '4' })).toBe('BORDER="1" CELLPADDING="4"')
  })

  test('htmlAttributes escapes quotes and markup in values', () => {
    expect(htmlAttributes({ bgcolor: 'a"b' })).toBe('BGCOLOR="a&quot;b"')
    expect(htmlAttributes({ title: '<x & y>' })).toBe('TITLE="&lt;x &amp; y&gt;"')
  })

  test('mergeAttributes lets later lists win while keeping first position', () => {
    const merged = mergeAttributes({ a: '1', b: '2' }, { a: '3', c: '4' })
    expect(Object.entries(merged)).toEqual([['a', '3'], ['b', '2'], ['c', '4']])
  })
})
