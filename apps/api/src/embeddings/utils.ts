/**
 * Vector math used by the in-process candidate store
 */
export class VectorUtilities {

  /**
   * Cosine similarity in [-1, 1]; zero vectors compare as 0
   */
  cosineSimilarity(a: number[], b: number[]): number {
    if (a.length !== b.length) {
      throw new Error('Vectors must have the same dimensions');
    }

    const magnitudeA = this.magnitude(a);
    const magnitudeB = this.magnitude(b);

    if (magnitudeA === 0 || magnitudeB === 0) {
      return 0;
    }

    return this.dotProduct(a, b) / (magnitudeA * magnitudeB);
  }

  /**
   * Same scale as pgvector's `<=>` operator: 1 - cosine similarity
   */
  cosineDistance(a: number[], b: number[]): number {
    return 1 - this.cosineSimilarity(a, b);
  }

  dotProduct(a: number[], b: number[]): number {
    let sum = 0;
    for (let i = 0; i < a.length; i++) {
      sum += a[i] * b[i];
    }

    return sum;
  }

  magnitude(vector: number[]): number {
    let sum = 0;
    for (const component of vector) {
      sum += component * component;
    }
    return Math.sqrt(sum);
  }
}

export const vectorUtils = new VectorUtilities();
