import { CourseVectorStoreService, toCourseCandidate } from '../../src/common/services/course-vector-store.service';

const mockQuery = jest.fn();
const mockEnd = jest.fn(async () => undefined);

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => ({ query: mockQuery, on: jest.fn(), end: mockEnd })),
}));

describe('toCourseCandidate', () => {
  it('maps a complete row', () => {
    expect(
      toCourseCandidate({
        id: 42,
        type: 'Course',
        name: 'Intro to Rust',
        provider: 'Test University',
        description: 'Ownership and borrowing',
        similarity: '0.83',
      }),
    ).toEqual({
      id: '42',
      type: 'course',
      name: 'Intro to Rust',
      provider: 'Test University',
      description: 'Ownership and borrowing',
      similarity: 0.83,
    });
  });

  it('rejects rows without id, with an unknown type or without similarity', () => {
    expect(toCourseCandidate({ id: '', type: 'course', similarity: 0.5 })).toBeNull();
    expect(toCourseCandidate({ id: 'a', type: 'webinar', similarity: 0.5 })).toBeNull();
    expect(toCourseCandidate({ id: 'a', type: 'course', similarity: null })).toBeNull();
    expect(toCourseCandidate({ id: 'a', type: 'course', similarity: 'high' })).toBeNull();
    expect(toCourseCandidate(null)).toBeNull();
  });

  it('clamps similarity into [0, 1] and fills missing text fields', () => {
    expect(toCourseCandidate({ id: 'a', type: 'degree', similarity: 1.2 })).toEqual({
      id: 'a',
      type: 'degree',
      similarity: 1,
      name: '',
      provider: '',
      description: '',
    });
  });
});

describe('CourseVectorStoreService', () => {
  beforeEach(() => {
    mockQuery.mockReset();
    mockEnd.mockClear();
  });

  it('queries with the serialized vector and the threshold table', async () => {
    mockQuery.mockResolvedValue({
      rows: [
        { id: 'c1', type: 'course', name: 'A', provider: 'P', description: 'D', similarity: 0.9 },
        { id: 'x1', type: 'webinar', name: 'B', provider: 'P', description: 'D', similarity: 0.8 },
      ],
    });
    const store = new CourseVectorStoreService();

    const result = await store.search({
      vector: [0.1, 0.2],
      minThreshold: 0.25,
      category: 'FIELD',
      thresholds: { SKILL: 0.3, FIELD: 0.25, DEFAULT: 0.3 },
      platform: 'coursera',
      limit: 80,
    });

    expect(result.map((c) => c.id)).toEqual(['c1']);
    expect(mockQuery).toHaveBeenCalledWith(expect.stringContaining('FROM courses'), [
      '[0.1,0.2]',
      'coursera',
      0.25,
      'FIELD',
      0.3,
      0.25,
      0.3,
      80,
    ]);
  });

  it('closes the pool on shutdown', async () => {
    mockQuery.mockResolvedValue({ rows: [] });
    const store = new CourseVectorStoreService();
    await store.onModuleDestroy();
    expect(mockEnd).not.toHaveBeenCalled();

    await store.search({
      vector: [1],
      minThreshold: 0.25,
      category: 'SKILL',
      thresholds: { SKILL: 0.3, FIELD: 0.25, DEFAULT: 0.3 },
      platform: 'coursera',
      limit: 10,
    });
    await store.onModuleDestroy();
    expect(mockEnd).toHaveBeenCalledTimes(1);
  });
});
