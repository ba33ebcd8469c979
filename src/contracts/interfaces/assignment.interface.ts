export interface Assignment {
    _id: string;
    driver_vehicle_link_id?: string;
}

/**
 * Vínculo conductor-vehículo que realizó el servicio
 */
export interface DriverVehicleLink {
    _id: string;
    driver_id?: string;
    vehicle_id?: string;
}
