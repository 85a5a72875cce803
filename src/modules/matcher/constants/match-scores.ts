// Диапазоны очков каскада. Каждая следующая ступень оценивается ниже предыдущей.
export const MATCH_SCORES = {
  exact: 100,
  substringBase: 75,      // 75 + 25 × (короче / длиннее)
  substringBonus: 25,
  wordOverlap: 50,        // 50 × Жаккар
  phonetic: 40,           // 40 × (1 − нормированный Левенштейн)
};
