import type { ITestApi } from "azure-devops-node-api/TestApi";

export type AzureCredentials = {
    collectionUri: string;
    accessToken?: string;
    personalAccessToken?: string;
};

export interface IAzureClientProvider {
    createTestApi(credentials: AzureCredentials): Promise<ITestApi>;
}
