import { Effect } from 'effect';
import type { ValidationError } from './errors/validation.error.js';
import type { INetworkDataSource, NetworkDataNotAvailableError } from './network-data/types.js';
import { renderReport } from './presentation/report.js';
import { compute } from './profitability/index.js';
import type { ProfitabilityResult } from './profitability/types.js';
import type { CalculatorSettings } from './settings.js';

export class App {
  public constructor(
    private readonly networkDataSource: INetworkDataSource,
    private readonly settings: CalculatorSettings,
  ) { }

  public run(): Effect.Effect<ProfitabilityResult, NetworkDataNotAvailableError | ValidationError> {
    const { networkDataSource, settings } = this;

    return Effect.gen(function* () {
      const network = yield* networkDataSource.getSnapshot();

      const result = yield* compute(
        settings.hardware,
        settings.energy,
        network,
        settings.displayCurrency,
        settings.parameters
      );

      for (const line of renderReport(settings.hardware, settings.energy, network, result)) {
        yield* Effect.log(line);
      }

      return result;
    }).pipe(
      Effect.withSpan("app.run", { attributes: { miner: settings.hardware.name } })
    );
  }
}
