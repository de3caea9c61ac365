import { isMatrix, lusolve, matrix } from "mathjs";

/**
 * One linear equation as coefficient map. `c` is the constant term and
 * the equation reads  Σ coef·var + c = 0.
 */
export type EquationProps = { [key: string]: number };

export class Equation {
  solveEquations(equations: EquationProps[]): Record<string, number> {
    // Step 1: collect all unknowns (exclude 'c')
    const variableNames = Array.from(
      new Set(
        equations.flatMap((eq) => Object.keys(eq).filter((k) => k !== "c")),
      ),
    );

    if (variableNames.length === 0) return {};
    if (equations.length !== variableNames.length) {
      throw new Error(
        `Equilibrium system is not square: equations=${equations.length}, unknowns=${variableNames.length}`,
      );
    }

    // Step 2: build K matrix and F vector
    const K = equations.map((eq) => variableNames.map((v) => eq[v] ?? 0));
    const F = equations.map((eq) => -(eq.c ?? 0));

    // Step 3: solve
    const solution = lusolve(matrix(K), matrix(F));
    const rows = isMatrix(solution) ? solution.toArray() : solution;

    // Step 4: flatten [[x],[y]] -> [x,y] and map back to names
    const result: Record<string, number> = {};
    variableNames.forEach((name, i) => {
      const row = rows[i];
      result[name] = Number(Array.isArray(row) ? row[0] : row);
    });

    return result;
  }
}
