export { validate } from './validate';

export { ValidationContext } from './ValidationContext';
export type { ValidationRule, VariableUsage } from './ValidationContext';

// The standard rule set, in reporting order.
export { specifiedRules } from './specifiedRules';

export { FieldsOnCorrectTypeRule } from './rules/FieldsOnCorrectTypeRule';
export { FragmentsOnCompositeTypesRule } from './rules/FragmentsOnCompositeTypesRule';
export { KnownArgumentNamesRule } from './rules/KnownArgumentNamesRule';
export { KnownDirectivesRule } from './rules/KnownDirectivesRule';
export { KnownFragmentNamesRule } from './rules/KnownFragmentNamesRule';
export { KnownTypeNamesRule } from './rules/KnownTypeNamesRule';
export { LoneAnonymousOperationRule } from './rules/LoneAnonymousOperationRule';
export { NoFragmentCyclesRule } from './rules/NoFragmentCyclesRule';
export { NoUndefinedVariablesRule } from './rules/NoUndefinedVariablesRule';
export { NoUnusedFragmentsRule } from './rules/NoUnusedFragmentsRule';
export { NoUnusedVariablesRule } from './rules/NoUnusedVariablesRule';
export { OverlappingFieldsCanBeMergedRule } from './rules/OverlappingFieldsCanBeMergedRule';
export { PossibleFragmentSpreadsRule } from './rules/PossibleFragmentSpreadsRule';
export { ProvidedRequiredArgumentsRule } from './rules/ProvidedRequiredArgumentsRule';
export { ScalarLeafsRule } from './rules/ScalarLeafsRule';
export { UniqueArgumentNamesRule } from './rules/UniqueArgumentNamesRule';
export { UniqueDirectivesPerLocationRule } from './rules/UniqueDirectivesPerLocationRule';
export { UniqueFragmentNamesRule } from './rules/UniqueFragmentNamesRule';
export { UniqueInputFieldNamesRule } from './rules/UniqueInputFieldNamesRule';
export { UniqueOperationNamesRule } from './rules/UniqueOperationNamesRule';
export { UniqueVariableNamesRule } from './rules/UniqueVariableNamesRule';
export { ValuesOfCorrectTypeRule } from './rules/ValuesOfCorrectTypeRule';
export { VariablesAreInputTypesRule } from './rules/VariablesAreInputTypesRule';
export { VariablesInAllowedPositionRule } from './rules/VariablesInAllowedPositionRule';
