/**
 * Dataset generation for query parsing benchmarks
 *
 * Generates query documents of different shapes and sizes. Every document is
 * valid, so all adapters do the same work.
 */

export interface BenchmarkDataset {
  name: string;
  description: string;
  content: string;
  size: number;
  characteristics: string[];
}

/**
 * Many small operations, each a handful of flat fields
 */
function generateFlatDocument(targetSize: number): string {
  let content = '';
  let index = 0;

  while (content.length < targetSize) {
    content += `query Op${index} { id name email createdAt updatedAt }\n`;
    index++;
  }

  return content;
}

/**
 * Deeply nested selection sets
 */
function generateNestedDocument(targetSize: number, depth: number): string {
  let content = '';
  let index = 0;

  while (content.length < targetSize) {
    let selection = 'id';
    for (let level = depth; level > 0; level--) {
      selection = `level${level} { id ${selection} }`;
    }
    content += `query Nested${index} { ${selection} }\n`;
    index++;
  }

  return content;
}

/**
 * Arguments, variables, directives, fragments and strings
 */
function generateMixedDocument(targetSize: number): string {
  const patterns = [
    'query Search($term: String!, $first: Int = 20) {\n  search(term: $term, first: $first) @cached(ttl: 60) {\n    ...ResultFields\n    ... on Product { price { amount currency } }\n  }\n}\n',
    'mutation Update($input: UpdateInput!) {\n  update(input: $input) { id status errors { path message } }\n}\n',
    'subscription Watch {\n  changed(filter: { kinds: [CREATED, DELETED], since: "2020-01-01" }) { id kind }\n}\n',
    'fragment ResultFields on Result {\n  id\n  title\n  snippet(format: """\n    plain text\n  """)\n  tags(limit: 5)\n}\n',
    '# comment line\n{ viewer { login repositories(first: 10, orderBy: { field: NAME, direction: ASC }) { totalCount } } }\n'
  ];

  let content = '';
  let patternIndex = 0;

  while (content.length < targetSize) {
    content += patterns[patternIndex % patterns.length];
    patternIndex++;
  }

  return content;
}

/**
 * Generate all benchmark datasets
 */
export function generateDatasets(): BenchmarkDataset[] {
  const datasets: Array<Omit<BenchmarkDataset, 'size'>> = [
    {
      name: 'small-flat',
      description: 'Small operations with flat selections',
      content: generateFlatDocument(1024),
      characteristics: ['many-operations', 'leaf-fields']
    },
    {
      name: 'medium-mixed',
      description: 'Realistic mix of operations and fragments',
      content: generateMixedDocument(50 * 1024),
      characteristics: ['variables', 'directives', 'fragments', 'object-values']
    },
    {
      name: 'large-mixed',
      description: 'Large document of mixed operations',
      content: generateMixedDocument(500 * 1024),
      characteristics: ['variables', 'directives', 'fragments', 'object-values']
    },
    {
      name: 'deep-nesting',
      description: 'Selection sets nested forty levels deep',
      content: generateNestedDocument(100 * 1024, 40),
      characteristics: ['deep-nesting']
    }
  ];

  return datasets.map(dataset => ({ ...dataset, size: dataset.content.length }));
}

export const datasets = generateDatasets();
