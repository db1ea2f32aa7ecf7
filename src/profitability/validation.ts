import { Either, ParseResult, Schema } from "effect";
import { ValidationError } from "../errors/validation.error.js";
import {
  EnergyConfigSchema,
  HardwareProfileSchema,
  ModelParametersSchema,
  NetworkSnapshotSchema,
  type EnergyConfig,
  type HardwareProfile,
  type ModelParameters,
  type NetworkSnapshot,
} from "./types.js";

export type ValidatedInputs = {
  readonly hardware: HardwareProfile;
  readonly energy: EnergyConfig;
  readonly network: NetworkSnapshot;
  readonly parameters: ModelParameters;
};

const decodeWithIssues = <A, I>(
  prefix: string,
  schema: Schema.Schema<A, I>,
  input: unknown
): Either.Either<A, readonly string[]> =>
  Schema.decodeUnknownEither(schema, { errors: "all" })(input).pipe(
    Either.mapLeft((error) =>
      ParseResult.ArrayFormatter.formatErrorSync(error).map((issue) =>
        issue.path.length > 0
          ? `${prefix}.${issue.path.map(String).join(".")}: ${issue.message}`
          : `${prefix}: ${issue.message}`
      )
    )
  );

/**
 * Checks every input before any arithmetic runs. All failing fields are
 * reported together rather than stopping at the first one.
 */
export const validateInputs = (
  hardware: unknown,
  energy: unknown,
  network: unknown,
  parameters: unknown
): Either.Either<ValidatedInputs, ValidationError> => {
  const decoded = {
    hardware: decodeWithIssues("hardware", HardwareProfileSchema, hardware),
    energy: decodeWithIssues("energy", EnergyConfigSchema, energy),
    network: decodeWithIssues("network", NetworkSnapshotSchema, network),
    parameters: decodeWithIssues("parameters", ModelParametersSchema, parameters),
  };

  const results: ReadonlyArray<Either.Either<unknown, readonly string[]>> = [
    decoded.hardware,
    decoded.energy,
    decoded.network,
    decoded.parameters,
  ];
  const issues = results.flatMap((result) =>
    Either.isLeft(result) ? result.left : []
  );

  if (issues.length > 0) {
    return Either.left(ValidationError.fromIssues(issues));
  }

  return Either.all(decoded).pipe(Either.mapLeft(ValidationError.fromIssues));
};
