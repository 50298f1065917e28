import { USE_CASES, type UseCaseDefinition } from '@netsettle/settlement';

export function listUseCases(): UseCaseDefinition[] {
  return Object.values(USE_CASES);
}

export function formatUseCaseLines(useCases: readonly UseCaseDefinition[]): string[] {
  const width = Math.max(...useCases.map((useCase) => useCase.id.length));
  return useCases.map((useCase) => `${useCase.id.padEnd(width)}  ${useCase.title}: ${useCase.description}`);
}
