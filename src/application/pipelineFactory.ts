import type { RuntimeSettings } from '../config';
import type { PipelineStages } from '../domain/interfaces/pipelineStage';
import { BinahStage } from '../domain/stages/binahStage';
import { ChesedStage } from '../domain/stages/chesedStage';
import { ChochmahStage } from '../domain/stages/chochmahStage';
import { DualPerspectiveStage } from '../domain/stages/dualPerspectiveStage';
import { GevurahStage } from '../domain/stages/gevurahStage';
import { HodStage } from '../domain/stages/hodStage';
import { KeterStage } from '../domain/stages/keterStage';
import { MalchutStage } from '../domain/stages/malchutStage';
import { NetzachStage } from '../domain/stages/netzachStage';
import { TiferetStage } from '../domain/stages/tiferetStage';
import { YesodStage } from '../domain/stages/yesodStage';
import { GatewayFactory, validateStageMapping } from '../services/gatewayFactory';

/**
 * Wires one stage per pipeline position to the gateway its settings name.
 * Mapping and provider errors surface here, before any run starts.
 */
export function createPipelineStages(
  settings: RuntimeSettings,
  keywords: readonly string[],
  gateways: GatewayFactory,
  env: NodeJS.ProcessEnv = process.env
): PipelineStages {
  validateStageMapping(settings.stages);
  const gatewayFor = (stageId: keyof PipelineStages) => gateways.forStage(settings.stages, stageId);

  const binahGateway = gatewayFor('binah');

  return {
    keter: new KeterStage(gatewayFor('keter'), {
      alignmentThreshold: settings.keter.alignment_threshold,
      maxAttempts: settings.keter.max_attempts,
    }),
    chochmah: new ChochmahStage(gatewayFor('chochmah')),
    binah: new DualPerspectiveStage(
      new BinahStage(binahGateway),
      binahGateway,
      gateways.secondary(settings.dual_perspective.secondary, env),
      { mode: settings.dual_perspective.mode, keywords }
    ),
    chesed: new ChesedStage(gatewayFor('chesed')),
    gevurah: new GevurahStage(gatewayFor('gevurah')),
    tiferet: new TiferetStage(gatewayFor('tiferet')),
    netzach: new NetzachStage(gatewayFor('netzach')),
    hod: new HodStage(gatewayFor('hod')),
    yesod: new YesodStage(gatewayFor('yesod')),
    malchut: new MalchutStage(gatewayFor('malchut')),
  };
}
