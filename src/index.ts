import { Config, validateConfig } from './config';
import { BotHandler } from './components/BotHandler';
import { createAppContext, createConversationServices } from './components/AppContext';
import { createTwilioChannels } from './integrations/TwilioChannels';
import { logger } from './utils/logger';

async function main() {
    try {
        // Load and validate configuration
        const config = Config.getInstance();
        validateConfig(config);
        logger.setLevel(config.logLevel);

        logger.info('Starting Crisis Support Bot...');
        logger.info(`Environment: ${config.nodeEnv}`);
        logger.info(`Alert delivery: ${config.deliveryMode}`);

        const context = createAppContext(config, {
            ...createConversationServices(config.llm),
            ...createTwilioChannels(config.twilio)
        });

        const botHandler = new BotHandler(context);
        await botHandler.initialize();

        logger.info('Bot started successfully!');

        // Handle graceful shutdown
        const shutdown = async () => {
            logger.info('Shutting down bot...');
            await botHandler.shutdown();
            process.exit(0);
        };
        const onSignal = () => {
            shutdown().catch(error => {
                console.error('Shutdown failed:', error);
                process.exit(1);
            });
        };
        process.once('SIGINT', onSignal);
        process.once('SIGTERM', onSignal);

    } catch (error) {
        console.error('Failed to start bot:', error);
        process.exit(1);
    }
}

// Start the application
if (require.main === module) {
    main().catch(console.error);
}
