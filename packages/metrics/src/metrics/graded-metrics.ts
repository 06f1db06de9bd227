/**
 * Pure graded-relevance metric functions.
 *
 * All functions are stateless. A ranked list is given as the grades of its
 * documents in rank order (index 0 = rank 1); unjudged documents carry grade 0.
 * A grade greater than 0 counts as relevant.
 */

function isRelevant(grade: number): boolean {
  return grade > 0;
}

function countRelevant(grades: readonly number[]): number {
  let count = 0;
  for (const grade of grades) {
    if (isRelevant(grade)) count++;
  }
  return count;
}

/**
 * Precision@K: fraction of the top K positions holding a relevant document.
 *
 * Formula: |relevant in grades[:K]| / K
 *
 * The denominator is always K, so a list shorter than K is penalized.
 * Returns 0 when K <= 0.
 */
export function precisionAtK(grades: readonly number[], k: number): number {
  if (k <= 0) return 0;
  return countRelevant(grades.slice(0, k)) / k;
}

/**
 * Recall@K against the relevant documents known for the query.
 *
 * Formula: |relevant in grades[:K]| / totalRelevant
 *
 * Returns 0 when totalRelevant is 0 or K <= 0.
 */
export function recallAtK(grades: readonly number[], totalRelevant: number, k: number): number {
  if (k <= 0 || totalRelevant <= 0) return 0;
  return countRelevant(grades.slice(0, k)) / totalRelevant;
}

/**
 * Discounted Cumulative Gain at position K with exponential gain.
 *
 * DCG = sum((2^g_i - 1) / log2(i + 1)) for i in 1..K
 */
export function dcgAtK(grades: readonly number[], k: number): number {
  const topK = grades.slice(0, Math.max(k, 0));

  // rank is 1-based, so log2(rank + 1) = log2(i + 2) for 0-based index i
  let dcg = 0;
  for (let i = 0; i < topK.length; i++) {
    const grade = topK[i] ?? 0;
    dcg += (2 ** grade - 1) / Math.log2(i + 2);
  }
  return dcg;
}

/**
 * Ideal DCG@K: DCG of the judged grades sorted in descending order.
 */
export function idealDcgAtK(judgedGrades: readonly number[], k: number): number {
  const ideal = [...judgedGrades].sort((a, b) => b - a);
  return dcgAtK(ideal, k);
}

/**
 * Normalized DCG at position K.
 *
 * `judgedGrades` holds every judged grade for the query, not just the ones
 * in this list; the ideal ordering is built from them.
 * Returns 0 (never NaN) when the ideal DCG is 0.
 */
export function ndcgAtK(
  grades: readonly number[],
  judgedGrades: readonly number[],
  k: number,
): number {
  if (k <= 0) return 0;
  const idcg = idealDcgAtK(judgedGrades, k);
  if (idcg === 0) return 0;
  return dcgAtK(grades, k) / idcg;
}

/**
 * Reciprocal rank of the first relevant document in the full list, 0 if none.
 */
export function reciprocalRank(grades: readonly number[]): number {
  for (let i = 0; i < grades.length; i++) {
    const grade = grades[i];
    if (grade !== undefined && isRelevant(grade)) {
      return 1 / (i + 1);
    }
  }
  return 0;
}

/**
 * Average Precision: mean of Precision@i over every rank i that holds a
 * relevant document. Returns 0 when the list holds none.
 */
export function averagePrecision(grades: readonly number[]): number {
  let relevantSeen = 0;
  let precisionSum = 0;

  for (let i = 0; i < grades.length; i++) {
    const grade = grades[i];
    if (grade !== undefined && isRelevant(grade)) {
      relevantSeen++;
      precisionSum += relevantSeen / (i + 1);
    }
  }

  if (relevantSeen === 0) return 0;
  return precisionSum / relevantSeen;
}
