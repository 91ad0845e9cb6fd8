import { describe, it, expect } from 'vitest';
import { aggregateText, aggregateCorpus } from '../nlp/aggregate.js';
import { tokenize, ngrams } from '../nlp/tokenizer.js';
import { vectorize, type VectorizerOptions } from '../nlp/tfidf.js';
import { resolveStopwords, STOPWORDS, ACADEMIC_STOPWORDS } from '../nlp/stopwords.js';
import { DEFAULT_THEME_OPTIONS } from '../types/index.js';

const UNIGRAMS_ONLY: VectorizerOptions = {
    maxFeatures: 1000,
    maxDf: 1,
    minDf: 1,
    ngramRange: [1, 1],
    academicStopwords: false,
};

describe('Text Aggregation', () => {
    it('should join title, abstract and body with single spaces', () => {
        expect(aggregateText({ title: 'T', abstract: 'A', body: 'B' })).toBe('T A B');
    });

    it('should treat missing fields as empty strings', () => {
        expect(aggregateText({ title: 'Only title' })).toBe('Only title  ');
        expect(aggregateText({ abstract: 'Only abstract' })).toBe(' Only abstract ');
        expect(aggregateText({})).toBe('  ');
    });

    it('should never contain undefined or null', () => {
        const text = aggregateText({ title: null, abstract: undefined, body: null });
        expect(text).toBe('  ');
    });

    it('should keep corpus order', () => {
        expect(aggregateCorpus([{ title: 'one' }, { title: 'two' }])).toEqual(['one  ', 'two  ']);
    });

    it('should return an empty list for an empty corpus', () => {
        expect(aggregateCorpus([])).toEqual([]);
    });
});

describe('Tokenizer', () => {
    it('should lowercase, split on punctuation and drop stopwords', () => {
        expect(tokenize('The Deep-Learning models, in 2024')).toEqual(['deep', 'learning', 'models']);
    });

    it('should drop single characters and pure numbers', () => {
        expect(tokenize('x 42 3d y')).toEqual(['3d']);
    });

    it('should keep non-ASCII letters', () => {
        expect(tokenize('Über Modelle')).toEqual(['über', 'modelle']);
    });

    it('should return nothing for empty text', () => {
        expect(tokenize('')).toEqual([]);
        expect(tokenize('   ')).toEqual([]);
    });

    it('should honor a custom stopword set', () => {
        expect(tokenize('novel models', resolveStopwords(true))).toEqual([]);
        expect(tokenize('novel models', resolveStopwords(false))).toEqual(['novel', 'models']);
    });

    it('should build unigrams then bigrams', () => {
        expect(ngrams(['a', 'b', 'c'], [1, 2])).toEqual(['a', 'b', 'c', 'a b', 'b c']);
        expect(ngrams(['a', 'b'], [2, 2])).toEqual(['a b']);
        expect(ngrams(['a'], [2, 2])).toEqual([]);
    });
});

describe('Stopwords', () => {
    it('should keep academic words out of the base list', () => {
        expect(STOPWORDS.has('the')).toBe(true);
        expect(STOPWORDS.has('novel')).toBe(false);
        expect(ACADEMIC_STOPWORDS.has('novel')).toBe(true);
        expect(resolveStopwords(false)).toBe(STOPWORDS);
    });
});

describe('TF-IDF Vectorizer', () => {
    it('should build an alphabetical vocabulary of terms shared by two or more documents', () => {
        const matrix = vectorize(['apple banana', 'apple cherry', 'banana cherry'], DEFAULT_THEME_OPTIONS);

        expect(matrix.vocabulary).toEqual(['apple', 'banana', 'cherry']);
        expect(matrix.df.get('apple')).toBe(2);
        expect(matrix.rows).toHaveLength(3);
        expect(matrix.rows[0]?.[0]).toBeCloseTo(Math.SQRT1_2, 10);
        expect(matrix.rows[0]?.[1]).toBeCloseTo(Math.SQRT1_2, 10);
        expect(matrix.rows[0]?.[2]).toBe(0);
    });

    it('should weight raw counts by smoothed idf and L2-normalize rows', () => {
        const matrix = vectorize(['apple apple banana', 'banana'], UNIGRAMS_ONLY);
        const idfApple = Math.log(3 / 2) + 1;
        const norm = Math.hypot(2 * idfApple, 1);

        expect(matrix.vocabulary).toEqual(['apple', 'banana']);
        expect(matrix.rows[0]?.[0]).toBeCloseTo((2 * idfApple) / norm, 10);
        expect(matrix.rows[0]?.[1]).toBeCloseTo(1 / norm, 10);
        expect(matrix.rows[1]).toEqual([0, 1]);
    });

    it('should drop terms present in more than maxDf of the documents', () => {
        const matrix = vectorize(['apple banana', 'apple cherry', 'apple banana'], {
            ...UNIGRAMS_ONLY,
            maxDf: 0.95,
        });
        expect(matrix.vocabulary).toEqual(['banana', 'cherry']);
    });

    it('should keep bigrams that meet the document frequency bounds', () => {
        const matrix = vectorize(
            ['neural network training', 'neural network inference', 'protein folding'],
            DEFAULT_THEME_OPTIONS
        );
        expect(matrix.vocabulary).toEqual(['network', 'neural', 'neural network']);
    });

    it('should cap the vocabulary by corpus-wide term count', () => {
        const matrix = vectorize(['alpha alpha beta gamma', 'alpha beta'], { ...UNIGRAMS_ONLY, maxFeatures: 2 });
        expect(matrix.vocabulary).toEqual(['alpha', 'beta']);
    });

    it('should yield an empty vocabulary for two documents under the default bounds', () => {
        const matrix = vectorize(['apple banana', 'apple banana'], DEFAULT_THEME_OPTIONS);
        expect(matrix.vocabulary).toEqual([]);
        expect(matrix.rows).toEqual([[], []]);
    });

    it('should leave a document without kept terms as a zero row', () => {
        const matrix = vectorize(['apple banana', 'apple banana', 'cherry'], {
            ...DEFAULT_THEME_OPTIONS,
            ngramRange: [1, 1],
        });
        expect(matrix.vocabulary).toEqual(['apple', 'banana']);
        expect(matrix.rows[2]).toEqual([0, 0]);
    });

    it('should be deterministic', () => {
        const texts = ['graph network embedding', 'graph embedding clustering', 'network clustering'];
        expect(vectorize(texts, DEFAULT_THEME_OPTIONS)).toEqual(vectorize(texts, DEFAULT_THEME_OPTIONS));
    });
});
