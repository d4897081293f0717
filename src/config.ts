import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import xml2js from 'xml2js';
import { z } from 'zod';

export const DEFAULT_SCAN_FOLDER = './target/classes';

const GRADLE_CLASSES = path.join('build', 'classes', 'java', 'main');

const concurrencySchema = z.coerce.number().int().positive();

export class Config {
  private static instance: Config | undefined;
  public scanFolder: string = DEFAULT_SCAN_FOLDER;
  public concurrency: number = os.availableParallelism();
  public scanJars: boolean = false;
  public verbose: boolean = false;

  private constructor(private readonly cwd: string) {}

  public static async getInstance(): Promise<Config> {
    if (!Config.instance) {
      Config.instance = new Config(process.cwd());
      await Config.instance.load();
    }
    return Config.instance;
  }

  /**
   * Builds a config for a specific working directory without touching the singleton.
   */
  public static async forDirectory(cwd: string): Promise<Config> {
    const config = new Config(cwd);
    await config.load();
    return config;
  }

  // For testing
  public static reset() {
    Config.instance = undefined;
  }

  private async load() {
    // 1. Explicit folder
    if (process.env.JMF_SCAN_FOLDER) {
      this.scanFolder = process.env.JMF_SCAN_FOLDER;
    } else {
      // 2. Build files of the project we are run from
      this.scanFolder = (await this.detectBuildOutput()) ?? DEFAULT_SCAN_FOLDER;
    }

    if (process.env.JMF_CONCURRENCY) {
      const parsed = concurrencySchema.safeParse(process.env.JMF_CONCURRENCY);
      if (parsed.success) {
        this.concurrency = parsed.data;
      } else {
        console.error(`Ignoring JMF_CONCURRENCY=${process.env.JMF_CONCURRENCY}: expected a positive integer`);
      }
    }

    this.scanJars = isTruthy(process.env.JMF_SCAN_JARS);
    this.verbose = isTruthy(process.env.JMF_VERBOSE);
  }

  /**
   * Maven: `<build><outputDirectory>` of pom.xml, else target/classes.
   * Gradle: build/classes/java/main.
   */
  private async detectBuildOutput(): Promise<string | null> {
    const pomPath = path.join(this.cwd, 'pom.xml');
    if (await this.fileExists(pomPath)) {
      const outputDirectory = await this.parsePomOutputDirectory(pomPath);
      return path.resolve(this.cwd, outputDirectory ?? path.join('target', 'classes'));
    }

    for (const name of ['build.gradle', 'build.gradle.kts']) {
      if (await this.fileExists(path.join(this.cwd, name))) {
        return path.resolve(this.cwd, GRADLE_CLASSES);
      }
    }
    return null;
  }

  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  private async parsePomOutputDirectory(filePath: string): Promise<string | null> {
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      const parser = new xml2js.Parser();
      const result: unknown = await parser.parseStringPromise(content);
      const parsed = pomSchema.safeParse(result);
      const outputDirectory = parsed.success ? parsed.data.project.build?.[0]?.outputDirectory?.[0] : undefined;
      // Property references like ${project.basedir} are left to Maven
      if (outputDirectory && !outputDirectory.includes('${')) {
        return outputDirectory.trim();
      }
    } catch (error) {
      console.error(`Failed to parse ${filePath}:`, error);
    }
    return null;
  }
}

const pomSchema = z.object({
  project: z.object({
    build: z.array(z.object({
      outputDirectory: z.array(z.string()).optional(),
    }).passthrough()).optional(),
  }).passthrough(),
});

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}
