/**
 * Which validity state triggers a log line
 */
export enum ValidityCondition {
  LogWhenValid = 'LogWhenValid',
  LogWhenInvalid = 'LogWhenInvalid',
}

/**
 * Which boolean state triggers a log line
 */
export enum BooleanCondition {
  LogWhenTrue = 'LogWhenTrue',
  LogWhenFalse = 'LogWhenFalse',
}

/** Branch taken after a validity check */
export enum ValidityOutcome {
  Valid = 'Valid',
  NotValid = 'NotValid',
}

/** Branch taken after a boolean check */
export enum ConditionOutcome {
  True = 'True',
  False = 'False',
}

export function shouldLogOnValidity(isValid: boolean, mode: ValidityCondition): boolean {
  return (mode === ValidityCondition.LogWhenInvalid && !isValid)
    || (mode === ValidityCondition.LogWhenValid && isValid);
}

export function shouldLogOnCondition(condition: boolean, mode: BooleanCondition): boolean {
  return (mode === BooleanCondition.LogWhenTrue && condition)
    || (mode === BooleanCondition.LogWhenFalse && !condition);
}

export function toValidityOutcome(isValid: boolean): ValidityOutcome {
  return isValid ? ValidityOutcome.Valid : ValidityOutcome.NotValid;
}

export function toConditionOutcome(condition: boolean): ConditionOutcome {
  return condition ? ConditionOutcome.True : ConditionOutcome.False;
}
