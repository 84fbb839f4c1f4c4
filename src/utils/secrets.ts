/**
 * AWS Secrets Manager and SSM Parameter Store helpers for retrieving the
 * Riksbank API subscription key
 *
 * The key is optional: without one the API is reachable anonymously at a
 * lower rate limit.
 */

import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { MonetaryPolicyDataConfig } from '../types';

/**
 * Retrieve a secret from AWS Secrets Manager
 * @param secretName The name/ARN of the secret
 */
export async function getSecret(secretName: string): Promise<string> {
    const client = new SecretsManagerClient({ region: process.env.AWS_REGION || 'eu-north-1' });

    try {
        console.log(`Fetching secret from Secrets Manager: ${secretName}`);
        const response = await client.send(new GetSecretValueCommand({ SecretId: secretName }));

        if (!response.SecretString) {
            throw new Error(`Secret ${secretName} has no string value`);
        }
        return response.SecretString;

    } catch (error) {
        console.error(`Failed to retrieve secret ${secretName}:`, error);
        throw error;
    } finally {
        client.destroy();
    }
}

/**
 * Retrieve a parameter from AWS Systems Manager Parameter Store
 * @param parameterName The name of the SSM parameter
 * @param withDecryption Whether to decrypt SecureString parameters
 */
export async function getParameter(parameterName: string, withDecryption: boolean = true): Promise<string> {
    const client = new SSMClient({ region: process.env.AWS_REGION || 'eu-north-1' });

    try {
        console.log(`Fetching parameter from SSM Parameter Store: ${parameterName}`);
        const response = await client.send(new GetParameterCommand({
            Name: parameterName,
            WithDecryption: withDecryption
        }));

        if (!response.Parameter?.Value) {
            throw new Error(`Parameter ${parameterName} has no value`);
        }
        return response.Parameter.Value;

    } catch (error) {
        console.error(`Failed to retrieve parameter ${parameterName}:`, error);
        throw error;
    } finally {
        client.destroy();
    }
}

/**
 * Resolve the subscription key: a literal key wins, then SSM Parameter Store,
 * then Secrets Manager. Returns undefined when none is configured.
 */
export async function getSubscriptionKey(
    config: Pick<MonetaryPolicyDataConfig, 'subscriptionKey' | 'subscriptionKeyParameter' | 'subscriptionKeySecret'>
): Promise<string | undefined> {
    if (config.subscriptionKey) {
        return config.subscriptionKey;
    }
    if (config.subscriptionKeyParameter) {
        return getParameter(config.subscriptionKeyParameter);
    }
    if (config.subscriptionKeySecret) {
        return getSecret(config.subscriptionKeySecret);
    }
    return undefined;
}
