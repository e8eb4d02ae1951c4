/**
 * URI construction for every Graph resource the sync touches.
 */

/** OData string literal with embedded single quotes doubled */
export function odataString(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function odataEquals(field: string, value: string): string {
  return `${field} eq ${odataString(value)}`;
}

export function odataIn(field: string, values: readonly string[]): string {
  return `${field} in (${values.map(odataString).join(',')})`;
}

export interface ListQuery {
  filter?: string;
  select?: readonly string[];
  top?: number;
}

export class GraphEndpoints {
  readonly baseUrl: string;

  constructor(baseUrl: string) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  private build(path: string, query: ListQuery = {}): string {
    // Encoded by hand: URLSearchParams would turn spaces in $filter into '+'.
    const params: string[] = [];
    if (query.filter) params.push(`$filter=${encodeURIComponent(query.filter)}`);
    if (query.select && query.select.length > 0) params.push(`$select=${query.select.join(',')}`);
    if (query.top !== undefined) params.push(`$top=${query.top}`);
    return params.length > 0 ? `${this.baseUrl}${path}?${params.join('&')}` : `${this.baseUrl}${path}`;
  }

  managedDevices(query?: ListQuery): string {
    return this.build('/deviceManagement/managedDevices', query);
  }

  managedDevice(managementId: string): string {
    return this.build(`/deviceManagement/managedDevices/${encodeURIComponent(managementId)}`);
  }

  detectedApps(query?: ListQuery): string {
    return this.build('/deviceManagement/detectedApps', query);
  }

  detectedAppDevices(appId: string, query?: ListQuery): string {
    return this.build(`/deviceManagement/detectedApps/${encodeURIComponent(appId)}/managedDevices`, query);
  }

  directoryDevices(query?: ListQuery): string {
    return this.build('/devices', query);
  }

  directoryDevice(directoryObjectId: string): string {
    return this.build(`/devices/${encodeURIComponent(directoryObjectId)}`);
  }

  groups(query?: ListQuery): string {
    return this.build('/groups', query);
  }

  group(groupId: string): string {
    return this.build(`/groups/${encodeURIComponent(groupId)}`);
  }

  /** Device members only; users and nested groups are left out */
  groupDeviceMembers(groupId: string, query?: ListQuery): string {
    return this.build(`/groups/${encodeURIComponent(groupId)}/members/microsoft.graph.device`, query);
  }

  /** Single-member removal target; the API has no batch removal */
  groupMemberRef(groupId: string, memberId: string): string {
    return `${this.baseUrl}/groups/${encodeURIComponent(groupId)}/members/${encodeURIComponent(memberId)}/$ref`;
  }

  /** Reference placed in a members@odata.bind list */
  directoryObjectRef(directoryObjectId: string): string {
    return `${this.baseUrl}/directoryObjects/${encodeURIComponent(directoryObjectId)}`;
  }
}
