import { countTokens, extractKeywords } from './keyword-extractor'

const RETAIL_POSTING =
  'Manage store operations, drive sales and coach staff. Skills: communication, leadership, operations, retail, Excel.'

describe('keyword extractor', () => {
  it('ranks tokens by descending frequency', () => {
    expect(extractKeywords('beta alpha beta gamma alpha beta', 2)).toEqual(['beta', 'alpha'])
  })

  it('breaks frequency ties by first occurrence', () => {
    expect(extractKeywords('delta charlie bravo charlie delta bravo', 3)).toEqual(['delta', 'charlie', 'bravo'])
  })

  it('returns every distinct token when fewer than topK exist', () => {
    expect(extractKeywords('one two one', 5)).toEqual(['one', 'two'])
  })

  it('returns an empty list for empty text or a non-positive topK', () => {
    expect(extractKeywords('', 10)).toEqual([])
    expect(extractKeywords('retail operations', 0)).toEqual([])
  })

  it('is deterministic, tie order included', () => {
    const first = extractKeywords(RETAIL_POSTING, 60)
    const second = extractKeywords(RETAIL_POSTING, 60)

    expect(second).toEqual(first)
  })

  it('extracts the retail posting keyword set', () => {
    expect(extractKeywords(RETAIL_POSTING, 60)).toEqual([
      'operations',
      'manage',
      'store',
      'drive',
      'sales',
      'coach',
      'staff',
      'skills',
      'communication',
      'leadership',
      'retail',
      'excel',
    ])
  })

  it('reports counts alongside tokens', () => {
    expect(countTokens('Excel, excel and SQL')).toEqual([
      { token: 'excel', count: 2 },
      { token: 'sql', count: 1 },
    ])
  })
})
