import { readFileSync } from 'fs';
import * as process from 'process';
import * as yaml from 'js-yaml';
import { plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ConfigModule } from '@nestjs/config';
import { Environment } from '@app/config/env/Environment';

export class Configuration {
  static getModule() {
    return ConfigModule.forRoot({
      cache: true,
      isGlobal: true,
      load: [() => Configuration.getEnv()],
    });
  }

  static getEnv(nodeEnv?: string, processEnv = process.env): Environment {
    const environment = this.getEnvByYml(nodeEnv);
    this.overrideSecrets(environment, processEnv);
    this.validate(environment);

    return environment;
  }

  private static getEnvByYml(nodeEnv = process.env.NODE_ENV): Environment {
    const suffix = !nodeEnv || nodeEnv === 'test' ? 'local' : nodeEnv;
    const yml = yaml.load(readFileSync(`env/env.${suffix}.yml`, 'utf8'));

    return plainToClass(Environment, yml);
  }

  // secrets stay out of the yml files
  private static overrideSecrets(
    environment: Environment,
    processEnv: NodeJS.ProcessEnv,
  ) {
    const apiKey = processEnv.GEMINI_API_KEY;

    if (environment.gemini && apiKey) {
      environment.gemini.apiKey = apiKey;
    }
  }

  private static validate(environment: Environment) {
    const errors = validateSync(environment);

    if (errors.length > 0) {
      throw new Error(errors.toString());
    }
  }
}
