/**
 * MQTT topic constants for route negotiation
 */

export class RouteTopics {
  static routeRequest(): string {
    return 'fleet/route/request';
  }

  static routeResponse(droneId: string): string {
    return `fleet/route/response/${droneId}`;
  }

  static allRouteResponses(): string {
    return 'fleet/route/response/+';
  }
}
