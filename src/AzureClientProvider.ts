import * as azureDevOps from "azure-devops-node-api";
import type { ITestApi } from "azure-devops-node-api/TestApi";
import type { AzureCredentials, IAzureClientProvider } from "./interfaces/IAzureClientProvider";

export class AzureClientProvider implements IAzureClientProvider {
    async createTestApi(credentials: AzureCredentials): Promise<ITestApi> {
        const connection = new azureDevOps.WebApi(credentials.collectionUri, this.createAuthHandler(credentials));
        return connection.getTestApi();
    }

    // The pipeline's access token wins; a personal access token is the fallback.
    private createAuthHandler(credentials: AzureCredentials) {
        if (credentials.accessToken) {
            return azureDevOps.getBearerHandler(credentials.accessToken);
        }
        if (credentials.personalAccessToken) {
            return azureDevOps.getPersonalAccessTokenHandler(credentials.personalAccessToken);
        }
        throw new Error("No access token or personal access token available to authenticate.");
    }
}
