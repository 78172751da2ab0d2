import inquirer from 'inquirer';
import chalk from 'chalk';
import * as fs from 'fs';
import { HashtagPipeline, createPipeline } from '../orchestrator/pipeline';
import config, { validateConfig } from '../config';
import { getPlatformGuideline } from '../config/platforms';
import { EnhancedHashtagResult, Platform } from '../types';
import { errorMessage } from '../utils/errors';
import { log } from '../utils/logger';

type MenuAction = 'generate' | 'trending' | 'blocked' | 'exit';

type GenerateAnswers = {
    imagePath: string;
    platform: Platform;
    maxHashtags: number;
    includeTrending: boolean;
    includeNiche: boolean;
    includeBranded: boolean;
    brandName: string;
};

/**
 * CLI for the hashtag generator
 */
export class CLI {
    /**
     * Start the CLI
     */
    async start(): Promise<void> {
        console.log(chalk.cyan.bold('\n#️⃣  Hashtag Signal - trending-aware hashtag generator\n'));

        const configStatus = validateConfig();
        if (!configStatus.valid) {
            console.log(chalk.red('❌ Missing configuration:'));
            configStatus.missing.forEach(key => {
                console.log(chalk.red(`   - ${key}`));
            });
            console.log(chalk.yellow('\n📝 Please update your .env file and try again.\n'));
            return;
        }

        console.log(chalk.green('✅ Configuration validated\n'));

        await this.showMainMenu(createPipeline());
    }

    private async showMainMenu(pipeline: HashtagPipeline): Promise<void> {
        for (;;) {
            const { action } = await inquirer.prompt<{ action: MenuAction }>([
                {
                    type: 'list',
                    name: 'action',
                    message: 'What would you like to do?',
                    choices: [
                        { name: '🏷️  Generate hashtags for an image', value: 'generate' },
                        { name: '📈 Show trending hashtags for a category', value: 'trending' },
                        { name: '🚫 Show blocked sources', value: 'blocked' },
                        { name: '❌ Exit', value: 'exit' },
                    ],
                },
            ]);

            try {
                switch (action) {
                    case 'generate':
                        await this.generate(pipeline);
                        break;
                    case 'trending':
                        await this.showTrending(pipeline);
                        break;
                    case 'blocked':
                        this.showBlocked(pipeline);
                        break;
                    case 'exit':
                        console.log(chalk.cyan('\n👋 Goodbye!\n'));
                        return;
                }
            } catch (error) {
                log.error('CLI action failed', { action, error: errorMessage(error) });
                console.log(chalk.red(`\n❌ ${errorMessage(error)}\n`));
            }
        }
    }

    private async generate(pipeline: HashtagPipeline): Promise<void> {
        const answers = await inquirer.prompt<GenerateAnswers>([
            {
                type: 'input',
                name: 'imagePath',
                message: '🖼️  Path to image:',
                validate: (input: string) => fs.existsSync(input.trim()) || 'File not found',
                filter: (input: string) => input.trim(),
            },
            {
                type: 'list',
                name: 'platform',
                message: '📱 Platform:',
                choices: config.hashtags.supportedPlatforms,
                default: config.hashtags.defaultPlatform,
            },
            {
                type: 'number',
                name: 'maxHashtags',
                message: '🔢 Maximum hashtags:',
                default: config.hashtags.maxHashtags,
            },
            { type: 'confirm', name: 'includeTrending', message: 'Include trending hashtags?', default: true },
            { type: 'confirm', name: 'includeNiche', message: 'Include niche hashtags?', default: true },
            { type: 'confirm', name: 'includeBranded', message: 'Include branded hashtags?', default: false },
            {
                type: 'input',
                name: 'brandName',
                message: '🏢 Brand name:',
                when: current => current.includeBranded === true,
            },
        ]);

        console.log(chalk.yellow('\n⏳ Analyzing image and collecting trends...\n'));

        const { classification, result, durationMs } = await pipeline.run(answers.imagePath, {
            platform: answers.platform,
            maxHashtags: Number.isFinite(answers.maxHashtags) ? answers.maxHashtags : config.hashtags.maxHashtags,
            includeTrending: answers.includeTrending,
            includeNiche: answers.includeNiche,
            includeBranded: answers.includeBranded,
            brandName: answers.brandName || undefined,
        });

        if (classification.success) {
            console.log(chalk.white(`🗂️  Category: ${chalk.bold(classification.primaryCategory)}`
                + chalk.gray(` (confidence ${classification.confidenceScore.toFixed(2)})`)));
        } else {
            console.log(chalk.yellow('🗂️  Category: unavailable, using general trends'));
        }

        this.printResult(result);
        console.log(chalk.gray(`   Took ${(durationMs / 1000).toFixed(1)}s\n`));
    }

    private printResult(result: EnhancedHashtagResult): void {
        if (!result.success) {
            console.log(chalk.red(`\n❌ Hashtag generation failed: ${result.error ?? 'unknown error'}\n`));
            return;
        }

        const [optimalMin, optimalMax] = getPlatformGuideline(result.platform).optimalRange;

        console.log(chalk.green(`\n✅ ${result.totalCount} hashtags for ${result.platform}`)
            + chalk.gray(` (optimal ${optimalMin}-${optimalMax})\n`));
        console.log(chalk.cyan.bold(`  ${result.hashtags.join(' ')}\n`));

        const buckets: Array<[string, string[]]> = [
            ['🔥 Trending', result.trendingHashtags],
            ['🎯 Niche', result.nicheHashtags],
            ['⭐ Popular', result.popularHashtags],
            ['🏢 Branded', result.brandedHashtags],
        ];
        for (const [label, tags] of buckets) {
            console.log(chalk.white(`  ${label}: `) + chalk.gray(tags.join(' ') || '-'));
        }

        console.log(chalk.white(`\n  📊 Engagement potential: ${chalk.bold((result.engagementPotential ?? 0).toFixed(1))}/10`));
        console.log(chalk.white(`  📈 Trending score: ${chalk.bold((result.trendingScore ?? 0).toFixed(1))}/10`));
    }

    private async showTrending(pipeline: HashtagPipeline): Promise<void> {
        const { category, platform } = await inquirer.prompt<{ category: string; platform: Platform }>([
            {
                type: 'input',
                name: 'category',
                message: '🗂️  Category:',
                default: 'general',
                filter: (input: string) => input.trim().toLowerCase(),
            },
            {
                type: 'list',
                name: 'platform',
                message: '📱 Platform:',
                choices: config.hashtags.supportedPlatforms,
                default: config.hashtags.defaultPlatform,
            },
        ]);

        console.log(chalk.yellow('\n⏳ Collecting trends...\n'));
        const result = await pipeline.trending(category, platform);

        if (!result.success) {
            console.log(chalk.red(`❌ ${result.error ?? 'No trending hashtags found'}\n`));
            return;
        }

        console.log(chalk.cyan(`📈 Trending for ${category} on ${platform}:\n`));
        result.records.forEach((record, index) => {
            const score = record.engagementScore === undefined ? '-' : String(record.engagementScore);
            console.log(chalk.white(`  ${String(index + 1).padStart(2)}. ${record.tag}`)
                + chalk.gray(`  ${score}  [${record.source}]`));
        });
        console.log(chalk.gray(`\n  Sources tried: ${result.attemptedSources.join(', ')}\n`));
    }

    private showBlocked(pipeline: HashtagPipeline): void {
        const blocked = pipeline.blockedSources();

        if (blocked.length === 0) {
            console.log(chalk.green('\n✅ No blocked sources\n'));
            return;
        }

        console.log(chalk.cyan('\n🚫 Blocked sources:\n'));
        blocked.forEach(host => console.log(chalk.gray(`  - ${host}`)));
        console.log('');
    }
}

export default CLI;
